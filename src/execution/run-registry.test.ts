import { describe, it, expect } from 'vitest';
import { RunRegistry } from './run-registry.js';
import type { RunOutcome } from '../agent/types.js';

function outcome(overrides: Partial<RunOutcome> = {}): RunOutcome {
  return { runId: 'r', state: 'DONE', turns: [], responseFailed: false, ...overrides };
}

describe('execution/run-registry', () => {
  it('tracks a run from start to completion', () => {
    const clock = { now: new Date('2026-03-01T12:00:00Z') };
    const runs = new RunRegistry({ now: () => clock.now });

    runs.start({ runId: 'run-1', userId: 'u1', eventId: 'evt-1', subject: 'Bug' });
    expect(runs.get('run-1')?.status).toBe('running');

    clock.now = new Date('2026-03-01T12:00:05Z');
    runs.complete(
      'run-1',
      outcome({ state: 'FAILED', condition: 'StepLimitExceeded', error: 'Step limit of 20 turns exceeded', authorizationPending: { app: 'github' } })
    );

    expect(runs.get('run-1')).toEqual({
      runId: 'run-1',
      userId: 'u1',
      eventId: 'evt-1',
      subject: 'Bug',
      status: 'failed',
      startedAt: new Date('2026-03-01T12:00:00Z'),
      completedAt: new Date('2026-03-01T12:00:05Z'),
      turns: 0,
      condition: 'StepLimitExceeded',
      responseFailed: false,
      authorizationPending: 'github',
      error: 'Step limit of 20 turns exceeded',
    });
  });

  it('lists newest first and drops the oldest finished runs beyond the limit', () => {
    const runs = new RunRegistry({ maxEntries: 2 });
    runs.start({ runId: 'a', userId: 'u' });
    runs.complete('a', outcome());
    runs.start({ runId: 'b', userId: 'u' });
    runs.start({ runId: 'c', userId: 'u' });

    expect(runs.list().map((r) => r.runId)).toEqual(['c', 'b']);
  });

  it('never drops a running run', () => {
    const runs = new RunRegistry({ maxEntries: 1 });
    runs.start({ runId: 'a', userId: 'u' });
    runs.start({ runId: 'b', userId: 'u' });

    expect(runs.list().map((r) => r.runId)).toEqual(['b', 'a']);
  });

  it('forgets finished runs after the retention period', () => {
    const clock = { now: new Date('2026-03-01T12:00:00Z') };
    const runs = new RunRegistry({ retentionMs: 60_000, now: () => clock.now });
    runs.start({ runId: 'a', userId: 'u' });
    runs.fail('a', 'SessionCreationFailed', 'down');

    clock.now = new Date('2026-03-01T12:01:01Z');

    expect(runs.list()).toEqual([]);
  });
});
