/**
 * Run Registry - recent agent runs for the status API
 */

import type { RunCondition, RunOutcome } from '../agent/types.js';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunRecord {
  runId: string;
  eventId?: string;
  userId: string;
  subject?: string;
  status: RunStatus;
  startedAt: Date;
  completedAt?: Date;
  turns?: number;
  condition?: RunCondition;
  responseFailed?: boolean;
  authorizationPending?: string;
  error?: string;
}

export interface RunRegistryOptions {
  /** Finished runs kept at most (default 200) */
  maxEntries?: number;
  /** Finished runs are dropped after this long (default 24h) */
  retentionMs?: number;
  now?: () => Date;
}

export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly maxEntries: number;
  private readonly retentionMs: number;
  private readonly now: () => Date;

  constructor(options: RunRegistryOptions = {}) {
    this.maxEntries = options.maxEntries ?? 200;
    this.retentionMs = options.retentionMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  start(run: { runId: string; userId: string; eventId?: string; subject?: string }): RunRecord {
    const record: RunRecord = { ...run, status: 'running', startedAt: this.now() };
    this.runs.set(run.runId, record);
    this.prune();
    return record;
  }

  complete(runId: string, outcome: RunOutcome): void {
    const record = this.runs.get(runId);
    if (!record) return;

    record.status = outcome.state === 'DONE' ? 'completed' : 'failed';
    record.completedAt = this.now();
    record.turns = outcome.turns.length;
    record.condition = outcome.condition;
    record.responseFailed = outcome.responseFailed;
    record.authorizationPending = outcome.authorizationPending?.app;
    record.error = outcome.error;
  }

  /** Mark a run that ended before the agent loop could produce an outcome */
  fail(runId: string, condition: RunCondition, error: string): void {
    const record = this.runs.get(runId);
    if (!record) return;

    record.status = 'failed';
    record.completedAt = this.now();
    record.condition = condition;
    record.error = error;
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  /** Newest first */
  list(): RunRecord[] {
    this.prune();
    return [...this.runs.values()].reverse();
  }

  private prune(): void {
    const cutoff = this.now().getTime() - this.retentionMs;
    for (const [runId, record] of this.runs) {
      if (record.completedAt && record.completedAt.getTime() < cutoff) {
        this.runs.delete(runId);
      }
    }

    let excess = this.runs.size - this.maxEntries;
    for (const [runId, record] of this.runs) {
      if (excess <= 0) break;
      if (record.status !== 'running') {
        this.runs.delete(runId);
        excess--;
      }
    }
  }
}
