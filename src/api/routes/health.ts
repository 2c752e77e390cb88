import { Router } from 'express';
import type { SubscriberStats } from '../../triggers/subscriber.js';

export interface HealthSource {
  stats(): SubscriberStats;
}

export function healthRouter(subscriber?: HealthSource): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const stats = subscriber?.stats();
    res.json({
      status: stats && !stats.connected ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      subscriber: stats ?? null,
    });
  });

  return router;
}
