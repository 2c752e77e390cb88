/**
 * Session Manager - per-user tool-router sessions
 *
 * Caches one live session per user. Creation is single-flight: concurrent
 * callers for the same user share one creation promise and receive the same
 * session or the same SessionCreationError. Expiry is checked lazily on
 * access; connection auth state is never cached here.
 */

import { logger } from '../utils/logger.js';
import { AppError, CancelledError, SessionCreationError, errorMessage } from '../utils/errors.js';
import { retry, withTimeout, type SleepFn } from '../utils/retry.js';
import { isExpired, type Session, type SessionApi, type SessionProvider } from './types.js';

export interface SessionManagerOptions {
  api: SessionApi;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  sleep?: SleepFn;
  now?: () => Date;
}

type InvalidationListener = (session: Session) => void;

export class SessionManager implements SessionProvider {
  private readonly sessions = new Map<string, Session>();
  private readonly inflight = new Map<string, Promise<Session>>();
  private readonly listeners = new Set<InvalidationListener>();
  private readonly shutdown = new AbortController();
  private readonly now: () => Date;

  constructor(private readonly options: SessionManagerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the cached session for `userId`, creating one when none is cached
   * or the cached one has expired. `signal` only stops this caller from
   * waiting; a shared creation keeps running for the other callers.
   */
  getOrCreate(userId: string, signal?: AbortSignal): Promise<Session> {
    const cached = this.sessions.get(userId);
    if (cached) {
      if (!isExpired(cached, this.now())) {
        return Promise.resolve(cached);
      }
      logger.info({ userId, expiresAt: cached.expiresAt.toISOString() }, 'Session expired, recreating');
      this.invalidate(userId);
    }

    let creation = this.inflight.get(userId);
    if (!creation) {
      creation = this.create(userId).finally(() => {
        this.inflight.delete(userId);
      });
      this.inflight.set(userId, creation);
    }

    return signal ? abandonOnAbort(creation, signal) : creation;
  }

  invalidate(userId: string): void {
    const session = this.sessions.get(userId);
    if (!session) return;

    this.sessions.delete(userId);
    logger.debug({ userId }, 'Session invalidated');
    for (const listener of this.listeners) {
      listener(session);
    }
  }

  /** Register a callback run whenever a cached session is dropped. */
  onInvalidate(listener: InvalidationListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Abort pending creations and drop every cached session (shutdown). */
  clear(): void {
    this.shutdown.abort();
    for (const userId of [...this.sessions.keys()]) {
      this.invalidate(userId);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private async create(userId: string): Promise<Session> {
    const { api, timeoutMs, maxAttempts } = this.options;
    let attempts = 0;

    try {
      const response = await retry(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (signal) => api.createSession({ userId }, signal),
            timeoutMs,
            'Session creation',
            this.shutdown.signal
          );
        },
        {
          maxAttempts,
          baseDelayMs: this.options.retryBaseDelayMs,
          maxDelayMs: this.options.retryMaxDelayMs,
          signal: this.shutdown.signal,
          sleep: this.options.sleep,
          // Network failures surface as plain errors and are worth retrying
          shouldRetry: (error) => !(error instanceof AppError) || error.retryable,
          onRetry: (error, attempt, delayMs) => {
            logger.warn({ userId, attempt, delayMs, error: errorMessage(error) }, 'Session creation failed, retrying');
          },
        }
      );

      const session: Session = {
        userId,
        handle: response.handle,
        createdAt: this.now(),
        expiresAt: response.expiresAt,
        authorizedConnections: new Set(),
      };

      this.sessions.set(userId, session);
      logger.info({ userId, expiresAt: session.expiresAt.toISOString(), attempts }, 'Created new session');
      return session;
    } catch (error) {
      if (error instanceof CancelledError) throw error;

      logger.error({ userId, attempts, error: errorMessage(error) }, 'Session creation failed');
      throw new SessionCreationError(
        `Could not create a session for ${userId}: ${errorMessage(error)}`,
        userId,
        attempts
      );
    }
  }
}

function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new CancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
