/**
 * Email event handler
 *
 * Turns one accepted mail trigger into one agent run: loop protection,
 * thread history, session acquisition, the run itself, then persistence
 * of the exchange and the run's status.
 */

import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { CancelledError, SessionCreationError, errorMessage } from '../utils/errors.js';
import { looksLikeHtml, stripHtml } from '../utils/html.js';
import type { Session, SessionProvider } from '../session/types.js';
import type { ConversationEntry, ReplyTarget, RunOutcome, RunRequest } from '../agent/types.js';
import {
  appendMessage,
  recentMessages,
  type Conversation,
  type ConversationStore,
} from '../conversation/store.js';
import type { RunRegistry } from '../execution/run-registry.js';
import type { TriggerEvent, TriggerEventHandler } from './types.js';

export interface AgentRunner {
  run(session: Session, request: RunRequest): Promise<RunOutcome>;
}

export interface EmailEventHandlerDeps {
  sessions: SessionProvider;
  agent: AgentRunner;
  conversations: ConversationStore;
  runs: RunRegistry;
  historyWindow: number;
  /** Mail from this address is never processed */
  inboxOwnerEmail?: string;
}

export function createEmailEventHandler(deps: EmailEventHandlerDeps): TriggerEventHandler {
  const owner = deps.inboxOwnerEmail?.trim().toLowerCase();

  return async (event, signal) => {
    const { senderAddress, subject } = event.payload;

    // LOOP PROTECTION: our own replies land in the same inbox
    if (owner && senderAddress === owner) {
      logger.warn({ eventId: event.id, from: senderAddress }, 'Ignoring email from the monitored inbox (loop protection)');
      return;
    }

    const runId = randomUUID();
    const threadId = event.payload.threadId ?? event.payload.messageId ?? event.id;
    deps.runs.start({ runId, userId: event.userId, eventId: event.id, subject });
    logger.info({ eventId: event.id, runId, userId: event.userId, threadId }, 'Processing email task');

    let conversation: Conversation;
    let session: Session;
    try {
      conversation = await deps.conversations.load(event.userId, threadId);
      session = await deps.sessions.getOrCreate(event.userId, signal);
    } catch (error) {
      if (error instanceof SessionCreationError) {
        // A run that never started is still a finished event; no redelivery
        deps.runs.fail(runId, 'SessionCreationFailed', error.message);
        logger.error({ eventId: event.id, runId, error: error.message }, 'Run failed: no session');
        return;
      }
      deps.runs.fail(runId, error instanceof CancelledError ? 'Cancelled' : 'ToolFailure', errorMessage(error));
      throw error;
    }

    const instruction = formatInstruction(event);
    let outcome: RunOutcome;
    try {
      outcome = await deps.agent.run(session, {
        runId,
        userId: event.userId,
        instruction,
        replyTarget: replyTargetFor(event),
        conversation: withPendingNote(recentMessages(conversation, deps.historyWindow), conversation),
        signal,
      });
    } catch (error) {
      deps.runs.fail(runId, error instanceof CancelledError ? 'Cancelled' : 'ToolFailure', errorMessage(error));
      throw error;
    }

    deps.runs.complete(runId, outcome);

    conversation = appendMessage(conversation, 'user', instruction);
    if (outcome.finalMessage) {
      conversation = appendMessage(conversation, 'assistant', toPlainText(outcome.finalMessage));
    }
    conversation = {
      ...conversation,
      pendingAction: outcome.authorizationPending
        ? {
            type: 'awaiting_connection',
            app: outcome.authorizationPending.app,
            redirectUrl: outcome.authorizationPending.redirectUrl,
            createdAt: new Date().toISOString(),
          }
        : outcome.state === 'DONE'
          ? undefined
          : conversation.pendingAction,
    };

    try {
      await deps.conversations.save(conversation);
    } catch (error) {
      // The run already acted; redelivering the event would act twice
      logger.error({ eventId: event.id, runId, error: errorMessage(error) }, 'Failed to save conversation');
    }

    logger.info(
      {
        eventId: event.id,
        runId,
        state: outcome.state,
        condition: outcome.condition,
        turns: outcome.turns.length,
        responseFailed: outcome.responseFailed,
      },
      'Email task finished'
    );
  };
}

export function formatInstruction(event: TriggerEvent): string {
  const { sender, subject, body } = event.payload;
  const lines = sender ? [`From: ${sender}`] : [];
  lines.push(`Subject: ${subject}`, '', body);
  return lines.join('\n');
}

function replyTargetFor(event: TriggerEvent): ReplyTarget | undefined {
  const { threadId, senderAddress } = event.payload;
  if (!threadId || !senderAddress) {
    logger.warn({ eventId: event.id }, 'Email has no thread id or sender, reply disabled');
    return undefined;
  }
  return { threadId, recipient: senderAddress, connectedAccountId: event.connectedAccountId };
}

function withPendingNote(entries: ConversationEntry[], conversation: Conversation): ConversationEntry[] {
  const pending = conversation.pendingAction;
  if (!pending) return entries;
  return [
    ...entries,
    {
      role: 'assistant',
      content: `(Waiting for the user to connect ${pending.app} before continuing the earlier request.)`,
    },
  ];
}

function toPlainText(message: string): string {
  return looksLikeHtml(message) ? stripHtml(message) : message;
}
