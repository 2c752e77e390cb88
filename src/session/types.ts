/**
 * Session types for per-user tool-router sessions
 */

import type { ConnectionId } from '../tools/types.js';

export interface Session {
  /** Owner of the session (the sender's address for mail triggers) */
  userId: string;

  /** Opaque handle; for the tool router this is the session's MCP endpoint */
  handle: string;

  createdAt: Date;

  expiresAt: Date;

  /**
   * Snapshot of connections the catalog last reported as AUTHORIZED.
   * Maintained by the registry client, never by the agent loop.
   */
  authorizedConnections: Set<ConnectionId>;
}

export interface CreateSessionRequest {
  userId: string;
}

export interface CreateSessionResponse {
  handle: string;
  expiresAt: Date;
}

/** Remote API that mints sessions */
export interface SessionApi {
  createSession(request: CreateSessionRequest, signal?: AbortSignal): Promise<CreateSessionResponse>;
}

/** What the agent loop needs to (re)acquire a session mid-run */
export interface SessionProvider {
  getOrCreate(userId: string, signal?: AbortSignal): Promise<Session>;
}

export function isExpired(session: Session, now: Date = new Date()): boolean {
  return session.expiresAt.getTime() <= now.getTime();
}
