/**
 * Run status routes
 *
 * GET /api/runs - List running and recent agent runs
 * GET /api/runs/:id - Get a specific run
 */

import { Router, type Request, type Response } from 'express';
import type { RunRecord, RunRegistry } from '../../execution/run-registry.js';
import type { ApiError, RunListResponse, RunStatusResponse } from '../schemas.js';

export function runsRouter(runs: RunRegistry): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const records = runs.list();
    const response: RunListResponse = {
      runs: records.map(toResponse),
      total: records.length,
    };
    res.json(response);
  });

  router.get('/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const record = runs.get(id);

    if (!record) {
      const error: ApiError = {
        error: `Run not found: ${id}`,
        code: 'RUN_NOT_FOUND',
      };
      res.status(404).json(error);
      return;
    }

    res.json(toResponse(record));
  });

  return router;
}

function toResponse(record: RunRecord): RunStatusResponse {
  const end = record.completedAt ?? new Date();
  return {
    runId: record.runId,
    eventId: record.eventId,
    userId: record.userId,
    subject: record.subject,
    status: record.status,
    condition: record.condition,
    turns: record.turns,
    responseFailed: record.responseFailed,
    authorizationPending: record.authorizationPending,
    error: record.error,
    startedAt: record.startedAt.toISOString(),
    completedAt: record.completedAt?.toISOString(),
    durationMs: end.getTime() - record.startedAt.getTime(),
  };
}
