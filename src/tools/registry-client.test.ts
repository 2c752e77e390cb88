import { describe, it, expect, vi } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { McpToolRegistryClient, classifyError, parseTextPayload } from './registry-client.js';
import type { CatalogCallResult, CatalogClient } from './catalog-client.js';
import type { Session } from '../session/types.js';
import type { ToolDescriptor } from './types.js';
import { TimeoutError, ToolExecutionError } from '../utils/errors.js';

type Responder = (name: string, args: Record<string, unknown>) => Promise<CatalogCallResult>;

class FakeCatalog implements CatalogClient {
  calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  closed = 0;

  constructor(private readonly respond: Responder) {}

  async callTool(name: string, args: Record<string, unknown>): Promise<CatalogCallResult> {
    this.calls.push({ name, args });
    return this.respond(name, args);
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

function text(payload: unknown, isError = false): CatalogCallResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload) }], isError };
}

function createSession(): Session {
  return {
    userId: 'user-1',
    handle: 'https://mcp.example.com/s/1',
    createdAt: new Date('2026-03-01T12:00:00Z'),
    expiresAt: new Date('2099-01-01T00:00:00Z'),
    authorizedConnections: new Set(),
  };
}

function setup(respond: Responder, timeoutMs = 1000) {
  const catalog = new FakeCatalog(respond);
  const connect = vi.fn(async () => catalog);
  const registry = new McpToolRegistryClient({ connect, timeoutMs });
  return { catalog, connect, registry };
}

const tool = (toolId: string, app = 'github'): ToolDescriptor => ({
  toolId,
  app,
  requiredConnection: app,
  inputSchema: {},
});

describe('tools/registry-client', () => {
  describe('searchTools', () => {
    it('maps catalog tools to descriptors', async () => {
      const { catalog, registry } = setup(async () =>
        text({
          tools: [
            { tool_slug: 'GITHUB_CREATE_AN_ISSUE', toolkit: 'GITHUB', input_schema: { type: 'object' } },
            { tool_slug: 'WEATHER_GET_FORECAST', toolkit: 'weather', connection_required: false },
          ],
        })
      );

      const tools = await registry.searchTools(createSession(), 'create an issue');

      expect(catalog.calls).toEqual([{ name: 'COMPOSIO_SEARCH_TOOLS', args: { use_case: 'create an issue' } }]);
      expect(tools).toEqual([
        { toolId: 'GITHUB_CREATE_AN_ISSUE', app: 'github', requiredConnection: 'github', inputSchema: { type: 'object' } },
        { toolId: 'WEATHER_GET_FORECAST', app: 'weather', requiredConnection: undefined, inputSchema: {} },
      ]);
    });

    it('returns an empty list when nothing matches', async () => {
      const { registry } = setup(async () => text({}));
      expect(await registry.searchTools(createSession(), 'teleport')).toEqual([]);
    });

    it('raises catalog errors as classified tool errors', async () => {
      const { registry } = setup(async () => text({ error: 'Invalid use_case' }, true));

      const error = await registry.searchTools(createSession(), 'x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error instanceof ToolExecutionError && error.kind).toBe('INVALID_INPUT');
      expect(error instanceof ToolExecutionError && error.message).toBe('Invalid use_case');
    });

    it('turns a hung call into a retryable timeout and drops the connection', async () => {
      const { catalog, registry } = setup(() => new Promise<never>(() => {}), 20);

      const error = await registry.searchTools(createSession(), 'x').catch((e: unknown) => e);

      expect(error instanceof ToolExecutionError && error.kind).toBe('TIMEOUT');
      expect(error instanceof ToolExecutionError && error.retryable).toBe(true);
      expect(catalog.closed).toBe(1);
    });

    it('redials after the catalog connection was closed', async () => {
      let closed = true;
      const { catalog, connect, registry } = setup(async () => {
        if (closed) throw new McpError(ErrorCode.ConnectionClosed, 'Catalog session https://mcp.example.com is closed');
        return text({ tools: [] });
      });
      const session = createSession();

      const error = await registry.searchTools(session, 'x').catch((e: unknown) => e);
      expect(error instanceof ToolExecutionError && error.kind).toBe('TRANSIENT');
      expect(error instanceof ToolExecutionError && error.retryable).toBe(true);
      expect(catalog.closed).toBe(1);

      closed = false;
      expect(await registry.searchTools(session, 'x')).toEqual([]);
      expect(connect).toHaveBeenCalledTimes(2);
    });

    it('calls the configured meta tool names', async () => {
      const catalog = new FakeCatalog(async () => text({ tools: [] }));
      const registry = new McpToolRegistryClient({
        connect: async () => catalog,
        timeoutMs: 1000,
        toolNames: { search: 'ROUTER_FIND_TOOLS' },
      });

      await registry.searchTools(createSession(), 'send a message');

      expect(catalog.calls).toEqual([{ name: 'ROUTER_FIND_TOOLS', args: { use_case: 'send a message' } }]);
    });
  });

  describe('connections', () => {
    it('returns an authorized app without prompting again', async () => {
      const { catalog, registry } = setup(async () =>
        text({ connection_id: 'ca_1', toolkit: 'github', status: 'ACTIVE' })
      );
      const session = createSession();

      const first = await registry.requestConnection(session, 'github');
      const second = await registry.requestConnection(session, 'github');

      expect(first).toEqual({ connectionId: 'ca_1', app: 'github', authState: 'AUTHORIZED', redirectUrl: undefined });
      expect(second).toEqual(first);
      expect(catalog.calls.map((call) => call.args)).toEqual([
        { toolkit: 'github', action: 'connect' },
        { toolkit: 'github', action: 'connect' },
      ]);
      expect(session.authorizedConnections.has('github')).toBe(true);
    });

    it('reports a pending authorization with its link', async () => {
      const { registry } = setup(async () =>
        text({ toolkit: 'github', status: 'INITIATED', redirect_url: 'https://auth.example.com/connect/1' })
      );
      const session = createSession();
      session.authorizedConnections.add('github');

      const connection = await registry.requestConnection(session, 'github');

      expect(connection).toEqual({
        connectionId: 'github',
        app: 'github',
        authState: 'PENDING',
        redirectUrl: 'https://auth.example.com/connect/1',
      });
      expect(session.authorizedConnections.has('github')).toBe(false);
    });

    it('checks status without starting authorization', async () => {
      const { catalog, registry } = setup(async () => text({ toolkit: 'slack', status: 'EXPIRED' }));

      const connection = await registry.checkConnection(createSession(), 'slack');

      expect(connection.authState).toBe('NONE');
      expect(catalog.calls[0]).toEqual({ name: 'COMPOSIO_MANAGE_CONNECTIONS', args: { toolkit: 'slack', action: 'status' } });
    });
  });

  describe('executeTools', () => {
    it('keeps every result when some calls fail', async () => {
      const { catalog, registry } = setup(async () =>
        text({
          results: [
            { tool_slug: 'GITHUB_CREATE_AN_ISSUE', successful: true, data: { number: 7 } },
            { tool_slug: 'GITHUB_ADD_LABEL', successful: false, error: 'Rate limit exceeded' },
            { tool_slug: 'GITHUB_ASSIGN', successful: false, error: 'Unprocessable', status_code: 422 },
          ],
        })
      );

      const results = await registry.executeTools(createSession(), [
        { tool: tool('GITHUB_CREATE_AN_ISSUE'), input: { title: 'Login bug' } },
        { tool: tool('GITHUB_ADD_LABEL'), input: { label: 'bug' } },
        { tool: tool('GITHUB_ASSIGN'), input: { assignee: 'jane' }, connectedAccountId: 'ca_9' },
      ]);

      expect(results).toEqual([
        { toolId: 'GITHUB_CREATE_AN_ISSUE', success: true, data: { number: 7 } },
        { toolId: 'GITHUB_ADD_LABEL', success: false, errorKind: 'TRANSIENT', message: 'Rate limit exceeded' },
        { toolId: 'GITHUB_ASSIGN', success: false, errorKind: 'INVALID_INPUT', message: 'Unprocessable' },
      ]);
      expect(catalog.calls[0].name).toBe('COMPOSIO_MULTI_EXECUTE_TOOL');
      expect(catalog.calls[0].args).toEqual({
        tools: [
          { tool_slug: 'GITHUB_CREATE_AN_ISSUE', arguments: { title: 'Login bug' } },
          { tool_slug: 'GITHUB_ADD_LABEL', arguments: { label: 'bug' } },
          { tool_slug: 'GITHUB_ASSIGN', arguments: { assignee: 'jane' }, connected_account_id: 'ca_9' },
        ],
      });
    });

    it('reports a missing result as a failure of that element', async () => {
      const { registry } = setup(async () => text({ results: [{ tool_slug: 'A', successful: true }] }));

      const results = await registry.executeTools(createSession(), [
        { tool: tool('A'), input: {} },
        { tool: tool('B'), input: {} },
      ]);

      expect(results).toEqual([
        { toolId: 'A', success: true, data: null },
        { toolId: 'B', success: false, errorKind: 'UNKNOWN', message: 'No result returned for this tool' },
      ]);
    });

    it('fails every element on a transport failure and reconnects afterwards', async () => {
      let fail = true;
      const { connect, registry } = setup(async () => {
        if (fail) throw new Error('socket hang up');
        return text({ results: [{ tool_slug: 'A', successful: true, data: 1 }] });
      });
      const session = createSession();

      const failed = await registry.executeTools(session, [
        { tool: tool('A'), input: {} },
        { tool: tool('B'), input: {} },
      ]);
      expect(failed).toEqual([
        { toolId: 'A', success: false, errorKind: 'TRANSIENT', message: 'socket hang up' },
        { toolId: 'B', success: false, errorKind: 'TRANSIENT', message: 'socket hang up' },
      ]);

      fail = false;
      const ok = await registry.executeTools(session, [{ tool: tool('A'), input: {} }]);
      expect(ok).toEqual([{ toolId: 'A', success: true, data: 1 }]);
      expect(connect).toHaveBeenCalledTimes(2);
    });

    it('does not call the catalog for an empty batch', async () => {
      const { connect, registry } = setup(async () => text({ results: [] }));
      expect(await registry.executeTools(createSession(), [])).toEqual([]);
      expect(connect).not.toHaveBeenCalled();
    });
  });

  it('reuses one catalog connection per session handle', async () => {
    const { connect, registry } = setup(async () => text({ tools: [] }));
    const session = createSession();

    await registry.searchTools(session, 'a');
    await registry.searchTools(session, 'b');

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith('https://mcp.example.com/s/1');
  });

  it('closes connections on release', async () => {
    const { catalog, registry } = setup(async () => text({ tools: [] }));
    await registry.searchTools(createSession(), 'a');

    await registry.release('https://mcp.example.com/s/1');
    await registry.release('https://mcp.example.com/s/1');

    expect(catalog.closed).toBe(1);
  });

  describe('classifyError', () => {
    it('maps timeouts and protocol errors', () => {
      expect(classifyError(new TimeoutError('call', 10))).toBe('TIMEOUT');
      expect(classifyError(new McpError(ErrorCode.RequestTimeout, 'slow'))).toBe('TIMEOUT');
      expect(classifyError(new McpError(ErrorCode.ConnectionClosed, 'gone'))).toBe('TRANSIENT');
      expect(classifyError(new McpError(ErrorCode.InvalidParams, 'bad'))).toBe('INVALID_INPUT');
    });

    it('maps HTTP status codes', () => {
      expect(classifyError(Object.assign(new Error('Service Unavailable'), { code: 503 }))).toBe('TRANSIENT');
      expect(classifyError(Object.assign(new Error('Forbidden'), { code: 403 }))).toBe('PERMISSION_DENIED');
      expect(classifyError(Object.assign(new Error('Not Found'), { code: 404 }))).toBe('UNKNOWN_TOOL');
    });

    it('falls back to the message', () => {
      expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe('TRANSIENT');
      expect(classifyError(new Error('No active connection for github'))).toBe('NOT_AUTHORIZED');
      expect(classifyError('weird')).toBe('UNKNOWN');
    });
  });

  describe('parseTextPayload', () => {
    it('reads JSON from the first text block', () => {
      expect(parseTextPayload([{ type: 'image', data: 'x' }, { type: 'text', text: '{"a":1}' }])).toEqual({ a: 1 });
    });

    it('keeps non-JSON text as a string', () => {
      expect(parseTextPayload([{ type: 'text', text: 'plain words' }])).toBe('plain words');
    });

    it('returns null without text', () => {
      expect(parseTextPayload([])).toBeNull();
    });
  });
});
