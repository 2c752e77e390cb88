import type { Server } from 'http';
import express, { type Express } from 'express';
import { logger } from '../utils/logger.js';
import type { RunRegistry } from '../execution/run-registry.js';
import { jwtAuth, type JwtAuthOptions } from './middleware/jwt-auth.js';
import { healthRouter, type HealthSource } from './routes/health.js';
import { runsRouter } from './routes/runs.js';

export interface StatusServerOptions {
  runs: RunRegistry;
  subscriber?: HealthSource;
  /** Without it the run API is open; bind to localhost in that case */
  auth?: JwtAuthOptions;
}

export function createServer(options: StatusServerOptions): Express {
  const app = express();
  app.use(express.json());

  // Routes
  app.use('/health', healthRouter(options.subscriber));

  // API Routes
  if (options.auth) {
    app.use('/api/runs', jwtAuth(options.auth), runsRouter(options.runs));
  } else {
    logger.warn('JWT_SECRET not configured - run API authentication disabled');
    app.use('/api/runs', runsRouter(options.runs));
  }

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'Status server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
