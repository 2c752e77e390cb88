/**
 * Timing helpers shared by the subscriber, session manager and agent loop:
 * exponential backoff with jitter, cancellable sleep, per-call timeouts and
 * a bounded retry wrapper.
 */

import { CancelledError, TimeoutError, isRetryable } from './errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Adds up to `baseDelayMs` of random jitter (default: true) */
  jitter?: boolean;
}

/**
 * Delay before attempt `attempt + 1`, given `attempt` failures so far.
 * base * 2^(attempt-1) + random(0..base), capped at maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponential = options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const jitter = options.jitter === false ? 0 : random() * options.baseDelayMs;
  return Math.min(exponential + jitter, options.maxDelayMs);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Run `operation` with its own abort signal that fires on timeout or when
 * `parent` aborts. Timeout rejects with TimeoutError (retryable), parent
 * abort with CancelledError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new CancelledError(`${label} cancelled`));
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Call `fn` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` attempts have been made. The last error is rethrown.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const shouldRetry = options.shouldRetry ?? isRetryable;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof CancelledError || attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}
