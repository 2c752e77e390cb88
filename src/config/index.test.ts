import { describe, it, expect } from 'vitest';
import { loadConfig, requireTriggerStreamUrl } from './index.js';
import { ConfigurationError } from '../utils/errors.js';

const REQUIRED = {
  ANTHROPIC_API_KEY: 'test-anthropic-key',
  TOOL_CATALOG_API_KEY: 'test-catalog-key',
};

describe('config', () => {
  it('applies defaults for everything optional', () => {
    const config = loadConfig(REQUIRED);

    expect(config.port).toBe(3000);
    expect(config.maxAgentSteps).toBe(20);
    expect(config.executeMaxAttempts).toBe(3);
    expect(config.dedupCacheSize).toBe(1000);
    expect(config.replyToolId).toBe('GMAIL_REPLY_TO_THREAD');
    expect(config.toolCatalogBaseUrl).toBe('https://backend.composio.dev/api/v3');
    expect(config.historyWindow).toBe(10);
    expect(config.jwtSecret).toBeUndefined();
    expect(config.triggerStreamUrl).toBeUndefined();
  });

  it('reads numeric overrides', () => {
    const config = loadConfig({ ...REQUIRED, MAX_AGENT_STEPS: '7', MAX_CONCURRENT_RUNS: '2', PORT: '8080' });

    expect(config.maxAgentSteps).toBe(7);
    expect(config.maxConcurrentRuns).toBe(2);
    expect(config.port).toBe(8080);
  });

  it('names the catalog meta tools', () => {
    expect(loadConfig(REQUIRED)).toMatchObject({
      catalogSearchTool: 'COMPOSIO_SEARCH_TOOLS',
      catalogConnectionsTool: 'COMPOSIO_MANAGE_CONNECTIONS',
      catalogExecuteTool: 'COMPOSIO_MULTI_EXECUTE_TOOL',
    });
    expect(loadConfig({ ...REQUIRED, CATALOG_SEARCH_TOOL: 'ROUTER_FIND_TOOLS' }).catalogSearchTool).toBe(
      'ROUTER_FIND_TOOLS'
    );
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ ...REQUIRED, TRIGGER_ID: '  ', AGENT_MODEL: '' });

    expect(config.triggerId).toBeUndefined();
    expect(config.agentModel).toBe('claude-sonnet-4-20250514');
  });

  it('fails with the missing keys listed', () => {
    try {
      loadConfig({ ANTHROPIC_API_KEY: 'test-anthropic-key' });
      expect.fail('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^toolCatalogApiKey: /);
      }
    }
  });

  it('rejects non-numeric numbers', () => {
    expect(() => loadConfig({ ...REQUIRED, MAX_AGENT_STEPS: 'many' })).toThrow(ConfigurationError);
  });

  it('requires a trigger stream for listening', () => {
    expect(() => requireTriggerStreamUrl(loadConfig(REQUIRED))).toThrow('TRIGGER_STREAM_URL is required');
    expect(
      requireTriggerStreamUrl(loadConfig({ ...REQUIRED, TRIGGER_STREAM_URL: 'wss://triggers.example.com/stream' }))
    ).toBe('wss://triggers.example.com/stream');
  });
});
