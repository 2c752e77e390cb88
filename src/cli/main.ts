import { logger } from '../utils/logger.js';
import { ConfigurationError, SessionCreationError } from '../utils/errors.js';
import { loadConfig, requireTriggerStreamUrl, type Config } from '../config/index.js';
import { createRuntime } from '../runtime.js';
import { listen } from './listen.js';
import { interactive } from './interactive.js';

const USAGE = 'Usage: mail-agent listen | mail-agent interactive <userId> <instruction...>';

export interface MainOptions {
  env?: Record<string, string | undefined>;
  listen?: typeof listen;
  interactive?: typeof interactive;
}

/** Exit code: 0 on a clean shutdown or a DONE run, 1 otherwise */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const [mode, ...rest] = argv;
  if (mode !== 'listen' && mode !== 'interactive') {
    console.error(USAGE);
    return 1;
  }

  let config: Config;
  let triggerStreamUrl: string | undefined;
  try {
    config = loadConfig(options.env);
    if (mode === 'listen') triggerStreamUrl = requireTriggerStreamUrl(config);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
      return 1;
    }
    throw error;
  }

  const runtime = createRuntime(config, { ephemeralConversations: mode === 'interactive' });
  logger.info({ mode, nodeEnv: config.nodeEnv, model: config.agentModel, maxSteps: config.maxAgentSteps }, 'Mail agent starting');

  const controller = new AbortController();
  const shutdown = (signalName: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info({ signal: signalName }, 'Shutting down');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    if (triggerStreamUrl) {
      await (options.listen ?? listen)(runtime, triggerStreamUrl, controller.signal);
      return 0;
    }

    const [userId, ...words] = rest;
    const outcome = await (options.interactive ?? interactive)(
      runtime,
      { userId, instruction: words.join(' ') },
      controller.signal
    );
    return outcome.state === 'DONE' ? 0 : 1;
  } catch (error) {
    if (error instanceof SessionCreationError) {
      console.error(`Run failed (SessionCreationFailed): ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await runtime.close();
  }
}
