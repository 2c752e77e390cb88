import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './schema.js';

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const str = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };
  const int = (name: string) => {
    const value = str(name);
    return value === undefined ? undefined : parseInt(value, 10);
  };

  const rawConfig = {
    port: int('PORT'),
    nodeEnv: str('NODE_ENV'),
    logLevel: str('LOG_LEVEL'),

    // API Authentication
    jwtSecret: str('JWT_SECRET'),
    jwtIssuer: str('JWT_ISSUER'),

    // Reasoning
    anthropicApiKey: str('ANTHROPIC_API_KEY'),
    agentModel: str('AGENT_MODEL'),
    maxAgentSteps: int('MAX_AGENT_STEPS'),
    reasoningTimeoutMs: int('REASONING_TIMEOUT_MS'),

    // Tool catalog
    toolCatalogApiKey: str('TOOL_CATALOG_API_KEY'),
    toolCatalogBaseUrl: str('TOOL_CATALOG_BASE_URL'),
    replyToolId: str('REPLY_TOOL_ID'),
    catalogSearchTool: str('CATALOG_SEARCH_TOOL'),
    catalogConnectionsTool: str('CATALOG_CONNECTIONS_TOOL'),
    catalogExecuteTool: str('CATALOG_EXECUTE_TOOL'),
    toolTimeoutMs: int('TOOL_TIMEOUT_MS'),
    executeMaxAttempts: int('EXECUTE_MAX_ATTEMPTS'),

    // Sessions
    sessionTimeoutMs: int('SESSION_TIMEOUT_MS'),
    sessionMaxAttempts: int('SESSION_MAX_ATTEMPTS'),
    sessionTtlMs: int('SESSION_TTL_MS'),

    // Trigger stream
    triggerStreamUrl: str('TRIGGER_STREAM_URL'),
    triggerId: str('TRIGGER_ID'),
    inboxOwnerEmail: str('INBOX_OWNER_EMAIL'),
    dedupCacheSize: int('DEDUP_CACHE_SIZE'),
    maxConcurrentRuns: int('MAX_CONCURRENT_RUNS'),
    dispatchMaxAttempts: int('DISPATCH_MAX_ATTEMPTS'),

    // Backoff
    reconnectBaseDelayMs: int('RECONNECT_BASE_DELAY_MS'),
    reconnectMaxDelayMs: int('RECONNECT_MAX_DELAY_MS'),
    retryBaseDelayMs: int('RETRY_BASE_DELAY_MS'),
    retryMaxDelayMs: int('RETRY_MAX_DELAY_MS'),

    // Conversation memory
    conversationsPath: str('CONVERSATIONS_PATH'),
    historyWindow: int('HISTORY_WINDOW'),
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration (${issues.join('; ')})`, issues);
  }

  return result.data;
}

/** The listen mode cannot start without a trigger stream */
export function requireTriggerStreamUrl(config: Config): string {
  if (!config.triggerStreamUrl) {
    throw new ConfigurationError('TRIGGER_STREAM_URL is required to listen for triggers', [
      'triggerStreamUrl: Required',
    ]);
  }
  return config.triggerStreamUrl;
}

export type { Config };
