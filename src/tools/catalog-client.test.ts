import { describe, it, expect } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { McpCatalogClient, redactHandle } from './catalog-client.js';
import { classifyError } from './registry-client.js';

describe('tools/catalog-client', () => {
  it('refuses calls before connecting with a retryable connection error', async () => {
    const client = new McpCatalogClient('https://mcp.example.com/s/1?token=test-token', 'test-catalog-key');

    const error = await client.callTool('COMPOSIO_SEARCH_TOOLS', { use_case: 'x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(McpError);
    expect(error instanceof McpError && error.code).toBe(ErrorCode.ConnectionClosed);
    expect(error instanceof McpError && error.message).toContain('Catalog session https://mcp.example.com is closed');
    expect(classifyError(error)).toBe('TRANSIENT');
  });

  it('keeps only the origin of a session handle', () => {
    expect(redactHandle('https://mcp.example.com/s/1?token=test-token')).toBe('https://mcp.example.com');
  });
});
