/**
 * Composition root: builds every process-scoped collaborator from the
 * configuration and hands them out explicitly.
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import type { Config } from './config/index.js';
import { AgentLoop } from './agent/loop.js';
import { AnthropicPlanner } from './agent/planner.js';
import { HttpSessionApi } from './session/api.js';
import { SessionManager } from './session/manager.js';
import { createMcpCatalogClientFactory, redactHandle } from './tools/catalog-client.js';
import { McpToolRegistryClient } from './tools/registry-client.js';
import { ResponseDispatcher } from './email/dispatcher.js';
import { FileConversationStore, MemoryConversationStore, type ConversationStore } from './conversation/store.js';
import { RunRegistry } from './execution/run-registry.js';

export interface Runtime {
  config: Config;
  sessions: SessionManager;
  registry: McpToolRegistryClient;
  agent: AgentLoop;
  conversations: ConversationStore;
  runs: RunRegistry;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Keep conversation history in memory instead of on disk */
  ephemeralConversations?: boolean;
}

export function createRuntime(config: Config, options: RuntimeOptions = {}): Runtime {
  logger.level = config.logLevel;

  const anthropic = new Anthropic({ apiKey: config.anthropicApiKey });
  const planner = new AnthropicPlanner({
    messages: { create: (body, requestOptions) => anthropic.messages.create(body, requestOptions) },
    model: config.agentModel,
    timeoutMs: config.reasoningTimeoutMs,
  });

  const sessions = new SessionManager({
    api: new HttpSessionApi({
      baseUrl: config.toolCatalogBaseUrl,
      apiKey: config.toolCatalogApiKey,
      defaultTtlMs: config.sessionTtlMs,
    }),
    timeoutMs: config.sessionTimeoutMs,
    maxAttempts: config.sessionMaxAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
  });

  const registry = new McpToolRegistryClient({
    connect: createMcpCatalogClientFactory(config.toolCatalogApiKey),
    timeoutMs: config.toolTimeoutMs,
    toolNames: {
      search: config.catalogSearchTool,
      manageConnections: config.catalogConnectionsTool,
      multiExecute: config.catalogExecuteTool,
    },
  });

  // Catalog connections live exactly as long as their session
  sessions.onInvalidate((session) => {
    registry.release(session.handle).catch((error: unknown) => {
      logger.warn({ handle: redactHandle(session.handle), error: errorMessage(error) }, 'Failed to release catalog connection');
    });
  });

  const dispatcher = new ResponseDispatcher({ registry, replyToolId: config.replyToolId });

  const agent = new AgentLoop(
    { planner, registry, sessions, dispatcher },
    {
      stepLimit: config.maxAgentSteps,
      executeMaxAttempts: config.executeMaxAttempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
    }
  );

  const conversations: ConversationStore = options.ephemeralConversations
    ? new MemoryConversationStore()
    : new FileConversationStore(config.conversationsPath);

  return {
    config,
    sessions,
    registry,
    agent,
    conversations,
    runs: new RunRegistry(),
    async close() {
      sessions.clear();
      await registry.close();
    },
  };
}
