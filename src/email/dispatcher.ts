/**
 * Response Dispatcher
 *
 * Sends the run's single reply through the catalog's reply tool, on the same
 * execution path as every other tool call.
 */

import { logger } from '../utils/logger.js';
import type { Session } from '../session/types.js';
import type { ToolRegistryClient } from '../tools/registry-client.js';
import type { ExecutionResult, ToolDescriptor } from '../tools/types.js';
import type { ReplyTarget } from '../agent/types.js';
import { replyTemplate } from './templates/reply.js';

export interface ResponseDispatcherOptions {
  registry: ToolRegistryClient;
  /** Catalog slug of the reply-to-thread tool */
  replyToolId: string;
}

export class ResponseDispatcher {
  private readonly replyTool: ToolDescriptor;

  constructor(private readonly options: ResponseDispatcherOptions) {
    // Runs under the monitored inbox's account, not a connection of the sender
    this.replyTool = {
      toolId: options.replyToolId,
      app: 'gmail',
      inputSchema: {},
    };
  }

  async reply(session: Session, target: ReplyTarget, message: string, signal?: AbortSignal): Promise<ExecutionResult> {
    logger.info({ userId: session.userId, threadId: target.threadId, to: target.recipient }, 'Sending reply');

    const [result] = await this.options.registry.executeTools(
      session,
      [
        {
          tool: this.replyTool,
          input: {
            thread_id: target.threadId,
            recipient_email: target.recipient,
            message_body: replyTemplate(message),
            is_html: true,
            user_id: 'me',
          },
          connectedAccountId: target.connectedAccountId,
        },
      ],
      signal
    );

    if (!result) {
      return { toolId: this.replyTool.toolId, success: false, errorKind: 'UNKNOWN', message: 'No reply result' };
    }

    if (result.success) {
      logger.info({ userId: session.userId, threadId: target.threadId }, 'Reply sent');
    } else {
      logger.warn({ userId: session.userId, threadId: target.threadId, errorKind: result.errorKind }, 'Reply failed');
    }
    return result;
  }
}
