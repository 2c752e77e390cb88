/**
 * Session API - mints tool-router sessions over HTTP
 *
 * POST {baseUrl}/tool_router/session { user_id } → { session_id?, url, expires_at? }
 * The returned URL is the session's MCP endpoint and becomes the handle.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { AppError } from '../utils/errors.js';
import type { CreateSessionRequest, CreateSessionResponse, SessionApi } from './types.js';

const createSessionResponseSchema = z.object({
  session_id: z.string().optional(),
  url: z.string().url(),
  expires_at: z.string().datetime({ offset: true }).optional(),
});

export interface HttpSessionApiOptions {
  baseUrl: string;
  apiKey: string;
  /** Lifetime assumed when the API does not report one */
  defaultTtlMs: number;
  fetch?: typeof fetch;
}

export class HttpSessionApi implements SessionApi {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpSessionApiOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createSession(request: CreateSessionRequest, signal?: AbortSignal): Promise<CreateSessionResponse> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/tool_router/session`;

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.options.apiKey,
      },
      body: JSON.stringify({ user_id: request.userId }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.warn({ userId: request.userId, status: response.status, errorText }, 'Session API rejected request');
      // 5xx and 429 are worth another attempt; anything else is final
      const retryable = response.status >= 500 || response.status === 429;
      throw new AppError(`Session API returned ${response.status}: ${errorText}`, 'SESSION_API_ERROR', retryable);
    }

    const parsed = createSessionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AppError('Session API returned an unexpected response', 'SESSION_API_ERROR');
    }

    const expiresAt = parsed.data.expires_at
      ? new Date(parsed.data.expires_at)
      : new Date(Date.now() + this.options.defaultTtlMs);

    return { handle: parsed.data.url, expiresAt };
  }
}
