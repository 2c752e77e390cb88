import { z } from 'zod';

export const configSchema = z.object({
  // Server
  port: z.number().int().min(1).max(65535).default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Status API authentication (disabled without a secret)
  jwtSecret: z.string().min(32).optional(),
  jwtIssuer: z.string().default('mail-agent'),

  // Reasoning
  anthropicApiKey: z.string().min(1),
  agentModel: z.string().default('claude-sonnet-4-20250514'),
  maxAgentSteps: z.number().int().min(1).max(200).default(20),
  reasoningTimeoutMs: z.number().int().min(1000).default(60000),

  // Tool catalog
  toolCatalogApiKey: z.string().min(1),
  toolCatalogBaseUrl: z.string().url().default('https://backend.composio.dev/api/v3'),
  replyToolId: z.string().min(1).default('GMAIL_REPLY_TO_THREAD'),
  catalogSearchTool: z.string().min(1).default('COMPOSIO_SEARCH_TOOLS'),
  catalogConnectionsTool: z.string().min(1).default('COMPOSIO_MANAGE_CONNECTIONS'),
  catalogExecuteTool: z.string().min(1).default('COMPOSIO_MULTI_EXECUTE_TOOL'),
  toolTimeoutMs: z.number().int().min(1000).default(60000),
  executeMaxAttempts: z.number().int().min(1).max(10).default(3),

  // Sessions
  sessionTimeoutMs: z.number().int().min(1000).default(15000),
  sessionMaxAttempts: z.number().int().min(1).max(10).default(3),
  sessionTtlMs: z.number().int().min(60000).default(1800000),

  // Trigger stream (required by the listen mode only)
  triggerStreamUrl: z.string().url().optional(),
  triggerId: z.string().min(1).optional(),
  inboxOwnerEmail: z.string().email().optional(),
  dedupCacheSize: z.number().int().min(1).default(1000),
  maxConcurrentRuns: z.number().int().min(1).default(8),
  dispatchMaxAttempts: z.number().int().min(1).default(5),

  // Backoff
  reconnectBaseDelayMs: z.number().int().min(1).default(1000),
  reconnectMaxDelayMs: z.number().int().min(1).default(60000),
  retryBaseDelayMs: z.number().int().min(1).default(500),
  retryMaxDelayMs: z.number().int().min(1).default(8000),

  // Conversation memory
  conversationsPath: z.string().min(1).default('./data/conversations'),
  historyWindow: z.number().int().min(0).max(100).default(10),
});

export type Config = z.infer<typeof configSchema>;
