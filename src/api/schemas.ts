import type { RunCondition } from '../agent/types.js';
import type { RunStatus } from '../execution/run-registry.js';

export interface ApiError {
  error: string;
  code: string;
}

export interface RunStatusResponse {
  runId: string;
  eventId?: string;
  userId: string;
  subject?: string;
  status: RunStatus;
  condition?: RunCondition;
  turns?: number;
  responseFailed?: boolean;
  authorizationPending?: string;
  error?: string;
  startedAt: string;
  completedAt?: string;
  durationMs: number;
}

export interface RunListResponse {
  runs: RunStatusResponse[];
  total: number;
}
