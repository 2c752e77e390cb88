/**
 * Trigger Source - the event stream the subscriber consumes
 */

import WebSocket from 'ws';
import { logger } from '../utils/logger.js';
import { CancelledError, SubscriptionConnectionError } from '../utils/errors.js';

export interface TriggerConnection {
  /** Settles when the connection is gone, for whatever reason */
  closed: Promise<void>;
  close(): void;
}

export interface TriggerSource {
  /**
   * Open one connection. Resolves once it is established; `onMessage`
   * receives each raw message. Aborting `signal` closes the connection.
   */
  connect(onMessage: (raw: string) => void, signal: AbortSignal): Promise<TriggerConnection>;
}

export interface WebSocketTriggerSourceOptions {
  url: string;
  apiKey?: string;
}

export class WebSocketTriggerSource implements TriggerSource {
  constructor(private readonly options: WebSocketTriggerSourceOptions) {}

  connect(onMessage: (raw: string) => void, signal: AbortSignal): Promise<TriggerConnection> {
    if (signal.aborted) return Promise.reject(new CancelledError());

    return new Promise<TriggerConnection>((resolve, reject) => {
      const headers: Record<string, string> = this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {};
      const ws = new WebSocket(this.options.url, { headers });
      let opened = false;

      const onAbort = () => ws.close();
      signal.addEventListener('abort', onAbort, { once: true });

      // Stale close events from this socket must never affect a newer one
      const closed = new Promise<void>((settle) => {
        ws.once('close', (code, reason) => {
          signal.removeEventListener('abort', onAbort);
          logger.info({ code, reason: reason.toString() }, 'Trigger stream closed');
          if (!opened) {
            reject(
              signal.aborted
                ? new CancelledError()
                : new SubscriptionConnectionError(`Trigger stream closed before opening (code ${code})`, 0)
            );
          }
          settle();
        });
      });

      ws.on('open', () => {
        opened = true;
        logger.info({ url: new URL(this.options.url).origin }, 'Trigger stream connected');
        resolve({ closed, close: () => ws.close() });
      });

      ws.on('message', (data) => {
        onMessage(rawDataToString(data));
      });

      ws.on('error', (err) => {
        logger.warn({ err }, 'Trigger stream error');
        if (!opened) {
          reject(new SubscriptionConnectionError(`Trigger stream connection failed: ${err.message}`, 0));
        }
      });
    });
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
