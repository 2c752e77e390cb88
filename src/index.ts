#!/usr/bin/env node
import 'dotenv/config';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { main } from './cli/main.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, 'Mail agent crashed');
    process.exitCode = 1;
  }
);
