import { describe, it, expect, vi, afterEach } from 'vitest';
import { TriggerSubscriber, type TriggerSubscriberOptions } from './subscriber.js';
import type { TriggerConnection, TriggerSource } from './source.js';
import type { TriggerEvent, TriggerEventHandler } from './types.js';
import { CancelledError } from '../utils/errors.js';

class FakeSource implements TriggerSource {
  connects = 0;
  failNext = 0;
  private onMessage?: (raw: string) => void;
  private closeCurrent?: () => void;

  async connect(onMessage: (raw: string) => void, signal: AbortSignal): Promise<TriggerConnection> {
    this.connects++;
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('connect ECONNREFUSED');
    }

    let close: () => void = () => {};
    const closed = new Promise<void>((resolve) => {
      close = resolve;
    });
    signal.addEventListener('abort', () => close(), { once: true });
    this.onMessage = onMessage;
    this.closeCurrent = close;
    return { closed, close };
  }

  emit(event: unknown): void {
    this.onMessage?.(JSON.stringify(event));
  }

  drop(): void {
    this.closeCurrent?.();
  }
}

function emailEvent(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    userId: 'user-1',
    source: 'EMAIL',
    payload: { sender: 'jane@example.com', subject: 'Task', body: `Do task ${id}`, threadId: `thread-${id}` },
    ...extra,
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const immediateSleep = vi.fn(async (_ms: number, signal?: AbortSignal) => {
  if (signal?.aborted) throw new CancelledError();
});

function createSubscriber(source: FakeSource, handler: TriggerEventHandler, overrides: Partial<TriggerSubscriberOptions> = {}) {
  return new TriggerSubscriber({
    source,
    handler,
    dedupCacheSize: 100,
    maxConcurrentRuns: 4,
    dispatchMaxAttempts: 3,
    reconnect: { baseDelayMs: 100, maxDelayMs: 1000 },
    dispatchRetry: { baseDelayMs: 10, maxDelayMs: 100 },
    sleep: immediateSleep,
    random: () => 0,
    ...overrides,
  });
}

describe('triggers/subscriber', () => {
  afterEach(() => {
    immediateSleep.mockClear();
  });

  it('starts exactly one run per event id', async () => {
    const source = new FakeSource();
    const handled: string[] = [];
    const subscriber = createSubscriber(source, async (event: TriggerEvent) => {
      handled.push(event.id);
    });
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit(emailEvent('evt-1'));
    source.emit(emailEvent('evt-1'));
    source.emit(emailEvent('evt-2'));
    await vi.waitFor(() => expect(handled).toEqual(['evt-1', 'evt-2']));

    expect(subscriber.stats()).toMatchObject({ accepted: 2, duplicates: 1 });
    await subscriber.stop();
    await running;
  });

  it('rejects malformed events without disturbing later ones', async () => {
    const source = new FakeSource();
    const handled: string[] = [];
    const subscriber = createSubscriber(source, async (event) => {
      handled.push(event.id);
    });
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit({ id: 'evt-bad', userId: 'user-1', payload: { sender: 'jane@example.com', subject: 'x' } });
    source.emit(emailEvent('evt-good'));
    await vi.waitFor(() => expect(handled).toEqual(['evt-good']));

    expect(subscriber.stats()).toMatchObject({ rejected: 1, accepted: 1 });
    await subscriber.stop();
    await running;
  });

  it('ignores events of other triggers when filtered', async () => {
    const source = new FakeSource();
    const handled: string[] = [];
    const subscriber = createSubscriber(
      source,
      async (event) => {
        handled.push(event.id);
      },
      { triggerId: 'trg-mine' }
    );
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit(emailEvent('evt-1', { triggerId: 'trg-other' }));
    source.emit(emailEvent('evt-2', { triggerId: 'trg-mine' }));
    await vi.waitFor(() => expect(handled).toEqual(['evt-2']));

    expect(subscriber.stats().ignored).toBe(1);
    await subscriber.stop();
    await running;
  });

  it('reconnects with growing backoff and keeps its dedup state', async () => {
    const source = new FakeSource();
    source.failNext = 3;
    const handled: string[] = [];
    const subscriber = createSubscriber(source, async (event) => {
      handled.push(event.id);
    });
    const running = subscriber.start();

    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));
    expect(source.connects).toBe(4);
    expect(immediateSleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);

    source.emit(emailEvent('evt-1'));
    await vi.waitFor(() => expect(handled).toEqual(['evt-1']));

    // A successful connection resets the backoff
    source.drop();
    await vi.waitFor(() => expect(source.connects).toBe(5));
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));
    expect(immediateSleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400, 100]);

    source.emit(emailEvent('evt-1'));
    source.emit(emailEvent('evt-2'));
    await vi.waitFor(() => expect(handled).toEqual(['evt-1', 'evt-2']));

    expect(subscriber.stats()).toMatchObject({ reconnects: 4, duplicates: 1 });
    await subscriber.stop();
    await running;
  });

  it('refuses dispatch above the concurrency limit and gives up after the retry budget', async () => {
    const source = new FakeSource();
    const gate = deferred();
    const handled: string[] = [];
    const subscriber = createSubscriber(
      source,
      async (event) => {
        handled.push(event.id);
        await gate.promise;
      },
      { maxConcurrentRuns: 1 }
    );
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit(emailEvent('evt-1'));
    source.emit(emailEvent('evt-2'));
    await vi.waitFor(() => expect(subscriber.failedEventIds()).toEqual(['evt-2']));

    expect(handled).toEqual(['evt-1']);
    expect(subscriber.stats()).toMatchObject({ failed: 1, inFlight: 1 });

    gate.resolve();
    await vi.waitFor(() => expect(subscriber.stats().inFlight).toBe(0));
    await subscriber.stop();
    await running;
  });

  it('requeues a failed dispatch', async () => {
    const source = new FakeSource();
    const handler = vi
      .fn<TriggerEventHandler>()
      .mockRejectedValueOnce(new Error('conversation store unavailable'))
      .mockResolvedValue(undefined);
    const subscriber = createSubscriber(source, handler);
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit(emailEvent('evt-1'));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2));
    await vi.waitFor(() => expect(subscriber.stats().inFlight).toBe(0));

    expect(subscriber.failedEventIds()).toEqual([]);
    await subscriber.stop();
    await running;
  });

  it('signals in-flight runs on stop and waits for them', async () => {
    const source = new FakeSource();
    let cancelled = false;
    const subscriber = createSubscriber(source, (_event, signal) => {
      return new Promise<void>((resolve) => {
        signal.addEventListener('abort', () => {
          cancelled = true;
          resolve();
        });
      });
    });
    const running = subscriber.start();
    await vi.waitFor(() => expect(subscriber.stats().connected).toBe(true));

    source.emit(emailEvent('evt-1'));
    await vi.waitFor(() => expect(subscriber.stats().inFlight).toBe(1));

    await subscriber.stop();
    await running;

    expect(cancelled).toBe(true);
    expect(subscriber.stats()).toMatchObject({ connected: false, inFlight: 0, failed: 0 });
  });
});
