/**
 * Tool catalog types
 *
 * Shapes exchanged between the agent loop and the tool catalog. Tool inputs
 * and outputs are schema-typed per tool and opaque to the core.
 */

export type ConnectionId = string;

export type AuthState = 'NONE' | 'PENDING' | 'AUTHORIZED';

export interface ToolDescriptor {
  /** Catalog slug, e.g. "GITHUB_CREATE_AN_ISSUE" */
  toolId: string;
  /** App/toolkit the tool belongs to, e.g. "github" */
  app: string;
  /** Connection that must be AUTHORIZED before the tool may run */
  requiredConnection?: ConnectionId;
  inputSchema: Record<string, unknown>;
}

export interface Connection {
  connectionId: ConnectionId;
  app: string;
  authState: AuthState;
  /** Link the user must open to finish authorization (PENDING only) */
  redirectUrl?: string;
}

export type ToolErrorKind =
  | 'TIMEOUT'
  | 'TRANSIENT'
  | 'INVALID_INPUT'
  | 'PERMISSION_DENIED'
  | 'NOT_AUTHORIZED'
  | 'UNKNOWN_TOOL'
  | 'UNKNOWN';

export const RETRYABLE_ERROR_KINDS: ReadonlySet<ToolErrorKind> = new Set(['TIMEOUT', 'TRANSIENT']);

export interface ToolInvocation {
  tool: ToolDescriptor;
  input: Record<string, unknown>;
  /** Catalog account to run under, when not the session's default */
  connectedAccountId?: string;
}

export type ExecutionResult =
  | { toolId: string; success: true; data: unknown }
  | { toolId: string; success: false; errorKind: ToolErrorKind; message?: string };

export function isRetryableResult(result: ExecutionResult): boolean {
  return !result.success && RETRYABLE_ERROR_KINDS.has(result.errorKind);
}

export function failedResult(toolId: string, errorKind: ToolErrorKind, message?: string): ExecutionResult {
  return { toolId, success: false, errorKind, message };
}
