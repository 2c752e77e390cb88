/**
 * Trigger Subscriber
 *
 * Supervises one connection to the trigger source: reconnects with
 * backoff for as long as it runs, validates and de-duplicates incoming
 * events, and dispatches each accepted event as an independent run.
 */

import { logger } from '../utils/logger.js';
import {
  CancelledError,
  DispatchOverloadError,
  MalformedEventError,
  SubscriptionConnectionError,
  errorMessage,
} from '../utils/errors.js';
import { backoffDelay, sleep, type BackoffOptions, type SleepFn } from '../utils/retry.js';
import { RecentIdCache } from './dedup-cache.js';
import { parseTriggerEvent } from './event-parser.js';
import type { TriggerConnection, TriggerSource } from './source.js';
import type { TriggerEvent, TriggerEventHandler } from './types.js';

export interface TriggerSubscriberOptions {
  source: TriggerSource;
  handler: TriggerEventHandler;
  dedupCacheSize: number;
  maxConcurrentRuns: number;
  dispatchMaxAttempts: number;
  reconnect: BackoffOptions;
  dispatchRetry: BackoffOptions;
  /** Only events of this trigger are accepted */
  triggerId?: string;
  signal?: AbortSignal;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => Date;
}

export interface SubscriberStats {
  connected: boolean;
  reconnects: number;
  accepted: number;
  rejected: number;
  duplicates: number;
  ignored: number;
  failed: number;
  inFlight: number;
}

export class TriggerSubscriber {
  private readonly controller = new AbortController();
  private readonly seen: RecentIdCache;
  private readonly inflight = new Set<Promise<void>>();
  private readonly failed = new Set<string>();
  private readonly wait: SleepFn;
  private readonly random: () => number;
  private connection?: TriggerConnection;
  private running = 0;
  private counters = { reconnects: 0, accepted: 0, rejected: 0, duplicates: 0, ignored: 0, failed: 0 };

  constructor(private readonly options: TriggerSubscriberOptions) {
    this.seen = new RecentIdCache(options.dedupCacheSize);
    this.wait = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;

    const external = options.signal;
    if (external) {
      if (external.aborted) this.controller.abort();
      else external.addEventListener('abort', () => this.controller.abort(), { once: true });
    }
  }

  /** Consume the source until stopped; resolves after in-flight runs settle. */
  async start(): Promise<void> {
    const signal = this.controller.signal;
    let attempt = 0;

    while (!signal.aborted) {
      try {
        this.connection = await this.options.source.connect((raw) => this.receive(raw), signal);
        attempt = 0;
        await this.connection.closed;
        this.connection = undefined;
        if (signal.aborted) break;
        attempt++;
        this.logConnectionError(new SubscriptionConnectionError('Trigger stream disconnected', attempt));
      } catch (error) {
        this.connection = undefined;
        if (signal.aborted || error instanceof CancelledError) break;
        attempt++;
        this.logConnectionError(new SubscriptionConnectionError(errorMessage(error), attempt));
      }

      const delayMs = backoffDelay(attempt, this.options.reconnect, this.random);
      this.counters.reconnects++;
      logger.info({ attempt, delayMs }, 'Reconnecting to trigger stream');
      try {
        await this.wait(delayMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) break;
        throw error;
      }
    }

    await this.drain();
    logger.info(this.stats(), 'Trigger subscriber stopped');
  }

  /** Close the stream, cancel in-flight runs and wait for them to settle. */
  async stop(): Promise<void> {
    this.controller.abort();
    this.connection?.close();
    await this.drain();
  }

  /** Feed one raw message; used by the source callback. */
  receive(raw: unknown): void {
    let event: TriggerEvent;
    try {
      event = parseTriggerEvent(raw, this.options.now?.());
    } catch (error) {
      if (!(error instanceof MalformedEventError)) throw error;
      this.counters.rejected++;
      logger.warn({ eventId: error.eventId, reason: error.message }, 'Rejected malformed trigger event');
      return;
    }

    const { triggerId } = this.options;
    if (triggerId && event.triggerId && event.triggerId !== triggerId) {
      this.counters.ignored++;
      logger.debug({ eventId: event.id, triggerId: event.triggerId }, 'Ignoring event of another trigger');
      return;
    }

    if (!this.seen.addIfAbsent(event.id)) {
      this.counters.duplicates++;
      logger.info({ eventId: event.id }, 'Duplicate trigger event skipped');
      return;
    }

    this.counters.accepted++;
    logger.info({ eventId: event.id, userId: event.userId }, 'Trigger event accepted');

    const run = this.dispatch(event).finally(() => {
      this.inflight.delete(run);
    });
    this.inflight.add(run);
  }

  stats(): SubscriberStats {
    return {
      connected: this.connection !== undefined,
      ...this.counters,
      inFlight: this.inflight.size,
    };
  }

  /** Event ids whose dispatch was given up after the retry budget */
  failedEventIds(): string[] {
    return [...this.failed];
  }

  /** Never rejects; failures are recorded against the event id. */
  private async dispatch(event: TriggerEvent): Promise<void> {
    const { maxConcurrentRuns, dispatchMaxAttempts, handler } = this.options;
    const signal = this.controller.signal;

    for (let attempt = 1; ; attempt++) {
      try {
        if (this.running >= maxConcurrentRuns) {
          throw new DispatchOverloadError(this.running, maxConcurrentRuns);
        }
        this.running++;
        try {
          await handler(event, signal);
        } finally {
          this.running--;
        }
        return;
      } catch (error) {
        if (error instanceof CancelledError || signal.aborted) {
          logger.info({ eventId: event.id }, 'Dispatch cancelled');
          return;
        }
        if (attempt >= dispatchMaxAttempts) {
          this.failed.add(event.id);
          this.counters.failed++;
          logger.error({ eventId: event.id, attempts: attempt, error: errorMessage(error) }, 'Event processing failed');
          return;
        }

        const delayMs = backoffDelay(attempt, this.options.dispatchRetry, this.random);
        logger.warn({ eventId: event.id, attempt, delayMs, error: errorMessage(error) }, 'Dispatch failed, requeueing');
        try {
          await this.wait(delayMs, signal);
        } catch (waitError) {
          if (waitError instanceof CancelledError) return;
          throw waitError;
        }
      }
    }
  }

  private async drain(): Promise<void> {
    await Promise.allSettled([...this.inflight]);
  }

  private logConnectionError(error: SubscriptionConnectionError): void {
    logger.warn({ attempt: error.attempt, error: error.message, retryable: error.retryable }, 'Trigger stream connection lost');
  }
}
