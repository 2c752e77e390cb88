/**
 * Trigger event parsing
 *
 * Accepts both the canonical event shape and the catalog trigger feed's
 * snake-case fields, and produces a validated TriggerEvent.
 */

import { z } from 'zod';
import { MalformedEventError } from '../utils/errors.js';
import { looksLikeHtml, stripHtml } from '../utils/html.js';
import type { TriggerEvent } from './types.js';

const NO_SUBJECT = '(no subject)';

const payloadSchema = z
  .object({
    sender: z.string().optional(),
    from: z.string().optional(),
    subject: z.string().optional(),
    body: z.string().optional(),
    message_text: z.string().optional(),
    threadId: z.string().optional(),
    thread_id: z.string().optional(),
    messageId: z.string().optional(),
    message_id: z.string().optional(),
  })
  .passthrough();

const rawEventSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    userId: z.string().optional(),
    user_id: z.string().optional(),
    source: z.string().optional(),
    occurredAt: z.string().optional(),
    timestamp: z.string().optional(),
    triggerId: z.string().optional(),
    trigger_id: z.string().optional(),
    connectedAccountId: z.string().optional(),
    metadata: z
      .object({
        trigger_id: z.string().optional(),
        connected_account: z.object({ id: z.string() }).partial().optional(),
      })
      .passthrough()
      .optional(),
    payload: payloadSchema.optional(),
    data: payloadSchema.optional(),
  })
  .passthrough();

/**
 * Parse a raw stream message (JSON text or an already decoded object).
 * Throws MalformedEventError when the id, user or body is missing.
 */
export function parseTriggerEvent(raw: unknown, now: Date = new Date()): TriggerEvent {
  const value = typeof raw === 'string' ? decodeJson(raw) : raw;

  const parsed = rawEventSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedEventError(`Invalid trigger event: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }

  const event = parsed.data;
  const id = event.id === undefined ? '' : String(event.id).trim();
  if (!id) {
    throw new MalformedEventError('Trigger event has no id');
  }

  if (event.source && event.source.toUpperCase() !== 'EMAIL') {
    throw new MalformedEventError(`Unsupported trigger source: ${event.source}`, id);
  }

  const userId = (event.userId ?? event.user_id ?? '').trim();
  if (!userId) {
    throw new MalformedEventError('Trigger event has no user id', id);
  }

  const payload = event.payload ?? event.data ?? {};
  const rawBody = payload.body ?? payload.message_text ?? '';
  const body = (looksLikeHtml(rawBody) ? stripHtml(rawBody) : rawBody).trim();
  if (!body) {
    throw new MalformedEventError('Trigger event has an empty body', id);
  }

  const sender = (payload.sender ?? payload.from ?? '').trim();
  const subject = payload.subject?.trim() || NO_SUBJECT;

  return {
    id,
    source: 'EMAIL',
    userId,
    occurredAt: parseDate(event.occurredAt ?? event.timestamp) ?? now,
    payload: {
      sender,
      senderAddress: extractAddress(sender),
      subject,
      body,
      threadId: payload.threadId ?? payload.thread_id,
      messageId: payload.messageId ?? payload.message_id,
    },
    connectedAccountId: event.connectedAccountId ?? event.metadata?.connected_account?.id,
    triggerId: event.triggerId ?? event.trigger_id ?? event.metadata?.trigger_id,
  };
}

/** `Jane Doe <jane@example.com>` → `jane@example.com` */
export function extractAddress(sender: string): string {
  const match = sender.match(/<([^<>\s]+@[^<>\s]+)>/);
  return (match ? match[1] : sender).trim().toLowerCase();
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedEventError('Trigger message is not valid JSON');
  }
}

function parseDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
