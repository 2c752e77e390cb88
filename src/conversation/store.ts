/**
 * Conversation Store - per-thread message history
 *
 * One JSON file per (userId, threadId) under the configured directory.
 * The planner sees the last `historyWindow` messages of a thread; a pending
 * action records that a run ended waiting for the user to connect an app.
 */

import { createHash, randomUUID } from 'crypto';
import path from 'path';
import fs from 'fs/promises';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ConversationEntry } from '../agent/types.js';

// Older messages are dropped from the file beyond this
const MAX_STORED_MESSAGES = 100;

const storedMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  at: z.string(),
});

const pendingActionSchema = z.object({
  type: z.literal('awaiting_connection'),
  app: z.string(),
  redirectUrl: z.string().optional(),
  createdAt: z.string(),
});

const conversationSchema = z.object({
  userId: z.string(),
  threadId: z.string(),
  messages: z.array(storedMessageSchema),
  pendingAction: pendingActionSchema.optional(),
  updatedAt: z.string(),
});

export type StoredMessage = z.infer<typeof storedMessageSchema>;
export type PendingAction = z.infer<typeof pendingActionSchema>;
export type Conversation = z.infer<typeof conversationSchema>;

export interface ConversationStore {
  /** Stored conversation, or an empty one for a new thread */
  load(userId: string, threadId: string): Promise<Conversation>;
  save(conversation: Conversation): Promise<void>;
}

export class FileConversationStore implements ConversationStore {
  constructor(private readonly basePath: string) {}

  async load(userId: string, threadId: string): Promise<Conversation> {
    const filePath = this.pathFor(userId, threadId);

    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return emptyConversation(userId, threadId);
      throw error;
    }

    const parsed = conversationSchema.safeParse(parseJson(data));
    if (!parsed.success) {
      logger.warn({ userId, threadId, filePath }, 'Conversation file is corrupt, starting a new history');
      return emptyConversation(userId, threadId);
    }
    return parsed.data;
  }

  async save(conversation: Conversation): Promise<void> {
    await fs.mkdir(this.basePath, { recursive: true });

    const filePath = this.pathFor(conversation.userId, conversation.threadId);
    const record: Conversation = {
      ...conversation,
      messages: conversation.messages.slice(-MAX_STORED_MESSAGES),
      updatedAt: new Date().toISOString(),
    };

    // Write-then-rename keeps a crash from leaving half a file behind
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(record, null, 2));
    await fs.rename(tmpPath, filePath);
  }

  private pathFor(userId: string, threadId: string): string {
    const digest = createHash('sha256').update(`${userId}\n${threadId}`).digest('hex').slice(0, 32);
    return path.join(this.basePath, `${digest}.json`);
  }
}

/** In-memory store for the interactive mode and tests */
export class MemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();

  async load(userId: string, threadId: string): Promise<Conversation> {
    const stored = this.conversations.get(key(userId, threadId));
    return stored ? structuredClone(stored) : emptyConversation(userId, threadId);
  }

  async save(conversation: Conversation): Promise<void> {
    this.conversations.set(key(conversation.userId, conversation.threadId), structuredClone(conversation));
  }
}

export function emptyConversation(userId: string, threadId: string): Conversation {
  return { userId, threadId, messages: [], updatedAt: new Date().toISOString() };
}

/** Last `window` messages, oldest first, in the planner's shape */
export function recentMessages(conversation: Conversation, window: number): ConversationEntry[] {
  if (window <= 0) return [];
  return conversation.messages.slice(-window).map(({ role, content }) => ({ role, content }));
}

export function appendMessage(conversation: Conversation, role: StoredMessage['role'], content: string): Conversation {
  return {
    ...conversation,
    messages: [...conversation.messages, { role, content, at: new Date().toISOString() }],
  };
}

function key(userId: string, threadId: string): string {
  return `${userId}\n${threadId}`;
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
