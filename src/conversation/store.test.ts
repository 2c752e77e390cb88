import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { FileConversationStore, appendMessage, emptyConversation, recentMessages } from './store.js';

describe('conversation/store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'conversations-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts an empty conversation for a new thread', async () => {
    const store = new FileConversationStore(dir);

    const conversation = await store.load('jane@example.com', 'thread-1');

    expect(conversation.userId).toBe('jane@example.com');
    expect(conversation.threadId).toBe('thread-1');
    expect(conversation.messages).toEqual([]);
    expect(conversation.pendingAction).toBeUndefined();
  });

  it('persists messages and the pending action per thread', async () => {
    const store = new FileConversationStore(path.join(dir, 'nested'));
    let conversation = await store.load('jane@example.com', 'thread-1');
    conversation = appendMessage(conversation, 'user', 'Open an issue');
    conversation = appendMessage(conversation, 'assistant', 'Please connect GitHub');
    conversation.pendingAction = { type: 'awaiting_connection', app: 'github', createdAt: '2026-03-01T12:00:00.000Z' };

    await store.save(conversation);
    const reloaded = await new FileConversationStore(path.join(dir, 'nested')).load('jane@example.com', 'thread-1');
    const otherThread = await store.load('jane@example.com', 'thread-2');

    expect(reloaded.messages.map((m) => m.content)).toEqual(['Open an issue', 'Please connect GitHub']);
    expect(reloaded.pendingAction).toEqual({
      type: 'awaiting_connection',
      app: 'github',
      createdAt: '2026-03-01T12:00:00.000Z',
    });
    expect(otherThread.messages).toEqual([]);
  });

  it('keeps concurrent saves of one thread apart', async () => {
    const store = new FileConversationStore(dir);
    const first = appendMessage(emptyConversation('u', 't'), 'user', 'first');
    const second = appendMessage(emptyConversation('u', 't'), 'user', 'second');

    await Promise.all([store.save(first), store.save(second)]);

    const [content] = (await store.load('u', 't')).messages.map((m) => m.content);
    expect(['first', 'second']).toContain(content);
    expect(await fs.readdir(dir)).toHaveLength(1);
  });

  it('starts over when the stored file is corrupt', async () => {
    const store = new FileConversationStore(dir);
    await store.save(appendMessage(emptyConversation('u', 't'), 'user', 'hello'));
    const [file] = await fs.readdir(dir);
    await fs.writeFile(path.join(dir, file), '{not json');

    const conversation = await store.load('u', 't');

    expect(conversation.messages).toEqual([]);
  });

  it('returns only the most recent messages', () => {
    let conversation = emptyConversation('u', 't');
    for (const content of ['one', 'two', 'three']) {
      conversation = appendMessage(conversation, 'user', content);
    }

    expect(recentMessages(conversation, 2)).toEqual([
      { role: 'user', content: 'two' },
      { role: 'user', content: 'three' },
    ]);
    expect(recentMessages(conversation, 0)).toEqual([]);
  });
});
