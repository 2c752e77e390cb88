/**
 * Catalog Client
 *
 * Wraps the @modelcontextprotocol/sdk Client for the tool catalog bound to a
 * single session handle. The handle is the session's MCP endpoint; the
 * catalog API key travels as a header on every request.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';

export interface CatalogCallResult {
  content: unknown[];
  isError: boolean;
}

export interface CatalogCallOptions {
  signal?: AbortSignal;
}

/** One live connection to the catalog for one session handle */
export interface CatalogClient {
  callTool(name: string, args: Record<string, unknown>, options?: CatalogCallOptions): Promise<CatalogCallResult>;
  close(): Promise<void>;
}

export type CatalogClientFactory = (handle: string) => Promise<CatalogClient>;

const CONNECT_TIMEOUT_MS = 30_000;

export class McpCatalogClient implements CatalogClient {
  private client: Client;
  private transport: StreamableHTTPClientTransport;
  private _connected = false;

  constructor(
    private readonly handle: string,
    apiKey: string
  ) {
    this.client = new Client({ name: 'mail-agent', version: '1.0.0' }, { capabilities: {} });
    this.transport = new StreamableHTTPClientTransport(new URL(handle), {
      requestInit: { headers: { 'x-api-key': apiKey } },
    });

    this.transport.onerror = (err) => {
      logger.warn({ err, handle: redactHandle(handle) }, 'Catalog transport error');
    };
    this.transport.onclose = () => {
      this._connected = false;
    };
  }

  async connect(): Promise<void> {
    if (this._connected) return;

    // Some endpoints hang on initialize; bound the handshake.
    await withTimeout(() => this.client.connect(this.transport), CONNECT_TIMEOUT_MS, 'Catalog connect');
    this._connected = true;
    logger.debug({ handle: redactHandle(this.handle) }, 'Catalog connected');
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: CatalogCallOptions = {}
  ): Promise<CatalogCallResult> {
    if (!this._connected) {
      // Classified as transient so the registry drops this client and redials
      throw new McpError(ErrorCode.ConnectionClosed, `Catalog session ${redactHandle(this.handle)} is closed`);
    }

    const raw = await this.client.callTool({ name, arguments: args }, undefined, { signal: options.signal });
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      return { content: [], isError: true };
    }

    return {
      content: parsed.data.content,
      isError: parsed.data.isError === true,
    };
  }

  async close(): Promise<void> {
    if (!this._connected) return;
    this._connected = false;
    try {
      await this.client.close();
    } catch (err) {
      logger.warn({ err, handle: redactHandle(this.handle) }, 'Failed to close catalog connection');
    }
  }
}

export function createMcpCatalogClientFactory(apiKey: string): CatalogClientFactory {
  return async (handle) => {
    const client = new McpCatalogClient(handle, apiKey);
    await client.connect();
    return client;
  };
}

/** Session URLs embed credentials; only the origin goes into logs. */
export function redactHandle(handle: string): string {
  try {
    return new URL(handle).origin;
  } catch {
    return '[invalid handle]';
  }
}
