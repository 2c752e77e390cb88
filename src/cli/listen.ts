/**
 * listen mode: trigger subscriber plus status server, until shutdown
 */

import { logger } from '../utils/logger.js';
import type { Runtime } from '../runtime.js';
import { TriggerSubscriber } from '../triggers/subscriber.js';
import { WebSocketTriggerSource } from '../triggers/source.js';
import { createEmailEventHandler } from '../triggers/email-handler.js';
import { createServer, startServer, stopServer } from '../api/server.js';

export async function listen(runtime: Runtime, triggerStreamUrl: string, signal: AbortSignal): Promise<void> {
  const { config } = runtime;

  const subscriber = new TriggerSubscriber({
    source: new WebSocketTriggerSource({ url: triggerStreamUrl, apiKey: config.toolCatalogApiKey }),
    handler: createEmailEventHandler({
      sessions: runtime.sessions,
      agent: runtime.agent,
      conversations: runtime.conversations,
      runs: runtime.runs,
      historyWindow: config.historyWindow,
      inboxOwnerEmail: config.inboxOwnerEmail,
    }),
    triggerId: config.triggerId,
    dedupCacheSize: config.dedupCacheSize,
    maxConcurrentRuns: config.maxConcurrentRuns,
    dispatchMaxAttempts: config.dispatchMaxAttempts,
    reconnect: { baseDelayMs: config.reconnectBaseDelayMs, maxDelayMs: config.reconnectMaxDelayMs },
    dispatchRetry: { baseDelayMs: config.retryBaseDelayMs, maxDelayMs: config.retryMaxDelayMs },
    signal,
  });

  const app = createServer({
    runs: runtime.runs,
    subscriber,
    auth: config.jwtSecret ? { secret: config.jwtSecret, issuer: config.jwtIssuer } : undefined,
  });
  const server = await startServer(app, config.port);

  logger.info(
    { triggerId: config.triggerId, maxConcurrentRuns: config.maxConcurrentRuns, model: config.agentModel },
    'Listening for mail triggers'
  );

  try {
    await subscriber.start();
  } finally {
    await stopServer(server);
  }
}
