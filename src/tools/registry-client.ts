/**
 * Tool Registry Client
 *
 * Typed facade over the tool catalog's three meta tools (search, manage
 * connections, multi-execute). Every operation is one round-trip to the
 * catalog connection bound to the session handle.
 */

import { z } from 'zod';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { CancelledError, TimeoutError, ToolExecutionError, errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/retry.js';
import type { Session } from '../session/types.js';
import type { CatalogClient, CatalogClientFactory } from './catalog-client.js';
import {
  failedResult,
  type AuthState,
  type Connection,
  type ExecutionResult,
  type ToolDescriptor,
  type ToolErrorKind,
  type ToolInvocation,
} from './types.js';

export interface ToolRegistryClient {
  searchTools(session: Session, intent: string, signal?: AbortSignal): Promise<ToolDescriptor[]>;
  requestConnection(session: Session, app: string, signal?: AbortSignal): Promise<Connection>;
  checkConnection(session: Session, app: string, signal?: AbortSignal): Promise<Connection>;
  executeTools(session: Session, invocations: ToolInvocation[], signal?: AbortSignal): Promise<ExecutionResult[]>;
}

export interface CatalogToolNames {
  search: string;
  manageConnections: string;
  multiExecute: string;
}

export const DEFAULT_CATALOG_TOOLS: CatalogToolNames = {
  search: 'COMPOSIO_SEARCH_TOOLS',
  manageConnections: 'COMPOSIO_MANAGE_CONNECTIONS',
  multiExecute: 'COMPOSIO_MULTI_EXECUTE_TOOL',
};

export interface McpToolRegistryOptions {
  connect: CatalogClientFactory;
  timeoutMs: number;
  toolNames?: Partial<CatalogToolNames>;
}

// ============================================
// Catalog wire formats
// ============================================

const searchResponseSchema = z.object({
  tools: z
    .array(
      z.object({
        tool_slug: z.string().min(1),
        toolkit: z.string().min(1),
        connection_required: z.boolean().optional(),
        input_schema: z.record(z.string(), z.unknown()).optional(),
      })
    )
    .default([]),
});

const connectionResponseSchema = z.object({
  connection_id: z.string().optional(),
  toolkit: z.string().optional(),
  status: z.string(),
  redirect_url: z.string().optional(),
});

const executeResponseSchema = z.object({
  results: z.array(
    z.object({
      tool_slug: z.string().optional(),
      successful: z.boolean(),
      data: z.unknown().optional(),
      error: z.string().nullish(),
      error_kind: z.string().nullish(),
      status_code: z.number().nullish(),
    })
  ),
});

type CatalogExecuteResult = z.infer<typeof executeResponseSchema>['results'][number];

const TOOL_ERROR_KINDS: readonly ToolErrorKind[] = [
  'TIMEOUT',
  'TRANSIENT',
  'INVALID_INPUT',
  'PERMISSION_DENIED',
  'NOT_AUTHORIZED',
  'UNKNOWN_TOOL',
  'UNKNOWN',
];

// ============================================
// Client
// ============================================

export class McpToolRegistryClient implements ToolRegistryClient {
  private readonly clients = new Map<string, Promise<CatalogClient>>();
  private readonly toolNames: CatalogToolNames;

  constructor(private readonly options: McpToolRegistryOptions) {
    this.toolNames = { ...DEFAULT_CATALOG_TOOLS, ...options.toolNames };
  }

  async searchTools(session: Session, intent: string, signal?: AbortSignal): Promise<ToolDescriptor[]> {
    const payload = await this.call(session, this.toolNames.search, { use_case: intent }, signal);
    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ToolExecutionError('Catalog returned an unreadable search response', 'UNKNOWN', this.toolNames.search);
    }

    const tools = parsed.data.tools.map(
      (tool): ToolDescriptor => ({
        toolId: tool.tool_slug,
        app: tool.toolkit.toLowerCase(),
        requiredConnection: tool.connection_required === false ? undefined : tool.toolkit.toLowerCase(),
        inputSchema: tool.input_schema ?? {},
      })
    );

    logger.debug({ userId: session.userId, intent, found: tools.length }, 'Tool search completed');
    return tools;
  }

  /**
   * Idempotent: the catalog answers ACTIVE for an app that is already
   * connected, so no second authorization prompt is issued.
   */
  async requestConnection(session: Session, app: string, signal?: AbortSignal): Promise<Connection> {
    return this.manageConnection(session, app, 'connect', signal);
  }

  async checkConnection(session: Session, app: string, signal?: AbortSignal): Promise<Connection> {
    return this.manageConnection(session, app, 'status', signal);
  }

  async executeTools(
    session: Session,
    invocations: ToolInvocation[],
    signal?: AbortSignal
  ): Promise<ExecutionResult[]> {
    if (invocations.length === 0) return [];

    const args = {
      tools: invocations.map((invocation) => ({
        tool_slug: invocation.tool.toolId,
        arguments: invocation.input,
        ...(invocation.connectedAccountId ? { connected_account_id: invocation.connectedAccountId } : {}),
      })),
    };

    let payload: unknown;
    try {
      payload = await this.call(session, this.toolNames.multiExecute, args, signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      // Whole batch failed in transport: report one failure per element.
      const kind = error instanceof ToolExecutionError ? error.kind : classifyError(error);
      logger.warn({ userId: session.userId, kind, error: errorMessage(error) }, 'Batch execution failed');
      return invocations.map((invocation) => failedResult(invocation.tool.toolId, kind, errorMessage(error)));
    }

    const parsed = executeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return invocations.map((invocation) =>
        failedResult(invocation.tool.toolId, 'UNKNOWN', 'Catalog returned an unreadable execution response')
      );
    }

    const results = parsed.data.results;
    return invocations.map((invocation, index) => {
      const toolId = invocation.tool.toolId;
      const match = results[index]?.tool_slug === undefined || results[index]?.tool_slug === toolId
        ? results[index]
        : results.find((r) => r.tool_slug === toolId);

      if (!match) {
        return failedResult(toolId, 'UNKNOWN', 'No result returned for this tool');
      }
      if (match.successful) {
        return { toolId, success: true, data: match.data ?? null };
      }
      return failedResult(toolId, resultErrorKind(match), match.error ?? undefined);
    });
  }

  /** Drop the catalog connection bound to a handle (session invalidated or broken). */
  async release(handle: string): Promise<void> {
    const pending = this.clients.get(handle);
    if (!pending) return;
    this.clients.delete(handle);
    try {
      const client = await pending;
      await client.close();
    } catch (err) {
      logger.debug({ err }, 'Catalog client was not open');
    }
  }

  async close(): Promise<void> {
    await Promise.all([...this.clients.keys()].map((handle) => this.release(handle)));
  }

  private async manageConnection(
    session: Session,
    app: string,
    action: 'connect' | 'status',
    signal?: AbortSignal
  ): Promise<Connection> {
    const payload = await this.call(session, this.toolNames.manageConnections, { toolkit: app, action }, signal);
    const parsed = connectionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ToolExecutionError(
        'Catalog returned an unreadable connection response',
        'UNKNOWN',
        this.toolNames.manageConnections
      );
    }

    const authState = toAuthState(parsed.data.status);
    const connection: Connection = {
      connectionId: parsed.data.connection_id ?? app,
      app,
      authState,
      redirectUrl: authState === 'PENDING' ? parsed.data.redirect_url : undefined,
    };

    if (authState === 'AUTHORIZED') {
      session.authorizedConnections.add(app);
    } else {
      session.authorizedConnections.delete(app);
    }

    logger.debug({ userId: session.userId, app, action, authState }, 'Connection state read');
    return connection;
  }

  private clientFor(handle: string): Promise<CatalogClient> {
    let pending = this.clients.get(handle);
    if (!pending) {
      pending = this.options.connect(handle);
      this.clients.set(handle, pending);
      pending.catch(() => {
        // Failed connects are not cached; the next call dials again.
        if (this.clients.get(handle) === pending) this.clients.delete(handle);
      });
    }
    return pending;
  }

  private async call(
    session: Session,
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      const result = await withTimeout(
        async (callSignal) => {
          const client = await this.clientFor(session.handle);
          return client.callTool(toolName, args, { signal: callSignal });
        },
        this.options.timeoutMs,
        toolName,
        signal
      );

      const payload = parseTextPayload(result.content);
      if (result.isError) {
        const message = extractErrorMessage(payload) ?? `${toolName} returned an error`;
        throw new ToolExecutionError(message, classifyMessage(message), toolName);
      }
      return payload;
    } catch (error) {
      if (error instanceof CancelledError || error instanceof ToolExecutionError) throw error;

      const kind = classifyError(error);
      if (kind === 'TRANSIENT' || kind === 'TIMEOUT') {
        // The connection may be dead; reconnect on the next call.
        await this.release(session.handle);
      }
      throw new ToolExecutionError(errorMessage(error), kind, toolName);
    }
  }
}

// ============================================
// Helpers
// ============================================

function toAuthState(status: string): AuthState {
  switch (status.toUpperCase()) {
    case 'ACTIVE':
    case 'CONNECTED':
    case 'AUTHORIZED':
      return 'AUTHORIZED';
    case 'INITIATED':
    case 'INITIALIZING':
    case 'PENDING':
      return 'PENDING';
    default:
      return 'NONE';
  }
}

/** Catalog replies travel as JSON inside the first text content block. */
export function parseTextPayload(content: unknown[]): unknown {
  for (const block of content) {
    if (isTextBlock(block)) {
      try {
        return JSON.parse(block.text);
      } catch {
        return block.text;
      }
    }
  }
  return null;
}

function isTextBlock(value: unknown): value is { type: 'text'; text: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'text' &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

function extractErrorMessage(payload: unknown): string | undefined {
  if (typeof payload === 'string') return payload;
  if (typeof payload === 'object' && payload !== null && 'error' in payload && typeof payload.error === 'string') {
    return payload.error;
  }
  return undefined;
}

function resultErrorKind(result: CatalogExecuteResult): ToolErrorKind {
  const declared = result.error_kind?.toUpperCase();
  const known = TOOL_ERROR_KINDS.find((kind) => kind === declared);
  if (known) return known;

  if (typeof result.status_code === 'number') {
    return classifyStatus(result.status_code);
  }
  return classifyMessage(result.error ?? '');
}

function classifyStatus(status: number): ToolErrorKind {
  if (status === 408) return 'TIMEOUT';
  if (status === 429 || status >= 500) return 'TRANSIENT';
  if (status === 401 || status === 403) return 'PERMISSION_DENIED';
  if (status === 404) return 'UNKNOWN_TOOL';
  if (status >= 400) return 'INVALID_INPUT';
  return 'UNKNOWN';
}

function classifyMessage(message: string): ToolErrorKind {
  const text = message.toLowerCase();
  if (/timed? ?out|timeout/.test(text)) return 'TIMEOUT';
  if (/rate limit|temporarily|unavailable|econnreset|econnrefused|socket hang up|fetch failed/.test(text)) {
    return 'TRANSIENT';
  }
  if (/no (active )?connect|not connected|not authorized|connection required/.test(text)) return 'NOT_AUTHORIZED';
  if (/permission|forbidden|unauthori[sz]ed|access denied/.test(text)) return 'PERMISSION_DENIED';
  if (/invalid|required|validation|malformed/.test(text)) return 'INVALID_INPUT';
  return 'UNKNOWN';
}

/** Map a thrown transport/protocol error onto the tool error taxonomy. */
export function classifyError(error: unknown): ToolErrorKind {
  if (error instanceof TimeoutError) return 'TIMEOUT';
  if (error instanceof ToolExecutionError) return error.kind;

  if (error instanceof McpError) {
    switch (error.code) {
      case ErrorCode.RequestTimeout:
        return 'TIMEOUT';
      case ErrorCode.ConnectionClosed:
        return 'TRANSIENT';
      case ErrorCode.InvalidParams:
        return 'INVALID_INPUT';
      case ErrorCode.MethodNotFound:
        return 'UNKNOWN_TOOL';
      default:
        return classifyMessage(error.message);
    }
  }

  if (error instanceof Error) {
    // StreamableHTTPError carries the HTTP status as `code`
    const code: unknown = 'code' in error ? error.code : undefined;
    if (typeof code === 'number' && code >= 400) {
      return classifyStatus(code);
    }
    return classifyMessage(error.message);
  }

  return 'UNKNOWN';
}
