/**
 * Planner - asks the reasoning model for the next loop action
 *
 * The model is forced to call a single tool whose input is validated into
 * the closed AgentAction union. Anything else is a PlanningError.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { CancelledError, PlanningError, errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/retry.js';
import { SYSTEM_PROMPT, buildPlanningPrompt } from './prompts.js';
import type { AgentAction, Planner, PlanningRequest } from './types.js';

const ACTION_TOOL_NAME = 'choose_next_action';

const ACTION_TOOL: Anthropic.Messages.Tool = {
  name: ACTION_TOOL_NAME,
  description: 'Choose exactly one next action for the email task.',
  input_schema: {
    type: 'object',
    properties: {
      action: { type: 'string', enum: ['SEARCH', 'AUTH', 'EXECUTE', 'RESPOND', 'STOP'] },
      query: { type: 'string', description: 'SEARCH: use case to find tools for' },
      app: { type: 'string', description: 'AUTH: toolkit slug to connect, e.g. "github"' },
      calls: {
        type: 'array',
        description: 'EXECUTE: tools to run, by tool_slug from a previous SEARCH',
        items: {
          type: 'object',
          properties: {
            tool_id: { type: 'string' },
            input: { type: 'object' },
          },
          required: ['tool_id', 'input'],
        },
      },
      message: { type: 'string', description: 'RESPOND: HTML reply to the sender' },
      reason: { type: 'string', description: 'STOP: why no reply is needed' },
    },
    required: ['action'],
  },
};

const actionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('SEARCH'), query: z.string().trim().min(1) }),
  z.object({ action: z.literal('AUTH'), app: z.string().trim().min(1) }),
  z.object({
    action: z.literal('EXECUTE'),
    calls: z
      .array(
        z.object({
          tool_id: z.string().trim().min(1),
          input: z.record(z.string(), z.unknown()).default({}),
        })
      )
      .min(1),
  }),
  z.object({ action: z.literal('RESPOND'), message: z.string().trim().min(1) }),
  z.object({ action: z.literal('STOP'), reason: z.string().optional() }),
]);

/** Validate raw tool input from the model into an AgentAction. */
export function parseAction(input: unknown): AgentAction {
  const parsed = actionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'action'}: ${issue.message}`);
    throw new PlanningError(`Planner returned an invalid action (${issues.join('; ')})`);
  }

  const data = parsed.data;
  switch (data.action) {
    case 'SEARCH':
      return { type: 'SEARCH', query: data.query };
    case 'AUTH':
      return { type: 'AUTH', app: data.app.toLowerCase() };
    case 'EXECUTE':
      return { type: 'EXECUTE', calls: data.calls.map((call) => ({ toolId: call.tool_id, input: call.input })) };
    case 'RESPOND':
      return { type: 'RESPOND', message: data.message };
    case 'STOP':
      return { type: 'STOP', reason: data.reason };
  }
}

/** Content blocks as the planner reads them; Anthropic's Message fits this shape */
export interface PlannerResponse {
  content: Array<{ type: string; name?: string; input?: unknown; text?: string }>;
}

export interface MessagesApi {
  create(
    body: Anthropic.Messages.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<PlannerResponse>;
}

export interface AnthropicPlannerOptions {
  messages: MessagesApi;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
}

export class AnthropicPlanner implements Planner {
  constructor(private readonly options: AnthropicPlannerOptions) {}

  async nextAction(request: PlanningRequest, signal?: AbortSignal): Promise<AgentAction> {
    const { messages, model, timeoutMs } = this.options;

    let response: PlannerResponse;
    try {
      response = await withTimeout(
        (callSignal) =>
          messages.create(
            {
              model,
              max_tokens: this.options.maxTokens ?? 2048,
              system: SYSTEM_PROMPT,
              tools: [ACTION_TOOL],
              tool_choice: { type: 'tool', name: ACTION_TOOL_NAME },
              messages: [{ role: 'user', content: buildPlanningPrompt(request) }],
            },
            { signal: callSignal }
          ),
        timeoutMs,
        'Planner',
        signal
      );
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      logger.warn({ error: errorMessage(error) }, 'Planner request failed');
      throw new PlanningError(`Planner request failed: ${errorMessage(error)}`, true);
    }

    const toolUse = response.content.find((block) => block.type === 'tool_use' && block.name === ACTION_TOOL_NAME);
    if (!toolUse) {
      throw new PlanningError('Planner did not choose an action');
    }

    const action = parseAction(toolUse.input);
    logger.debug({ action: action.type, step: request.turns.length }, 'Planner chose action');
    return action;
  }
}
