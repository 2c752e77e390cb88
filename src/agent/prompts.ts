import type { AgentTurn, ConversationEntry, PlanningRequest } from './types.js';

/** Longest serialized tool output shown to the planner per turn */
const MAX_OUTPUT_CHARS = 4000;

export const SYSTEM_PROMPT = `You are an email assistant. Each request is an email whose sender wants something done.

You work in steps. At every step you choose exactly ONE next action by calling the choose_next_action tool:

- SEARCH: find catalog tools for a use case ("create a GitHub issue"). You can only execute tools a SEARCH returned.
- AUTH: connect the sender's account for an app (toolkit slug from the search results).
- EXECUTE: run one or more discovered tools with inputs matching their input schema.
- RESPOND: write the reply to the sender and finish. Use this once, after the task is done or cannot be done.
- STOP: finish without replying.

Rules:
1. Analyse the email and decide what the sender wants.
2. Search before executing. If a tool needs a connection the system authenticates it for you.
3. When a tool fails, read the error and try a corrected input or a different tool. Do not repeat an identical failing call.
4. Never use email sending or replying tools yourself. Your RESPOND message is sent as the reply.
5. Write the RESPOND message in HTML (<p>, <ul>, <li>, <a>, <strong>), include links as plain URLs inside <a> tags, and say what you did.
6. You have a limited number of steps. When few remain, RESPOND with what you achieved.`;

export function buildPlanningPrompt(request: PlanningRequest): string {
  const sections: string[] = [];

  if (request.conversation.length > 0) {
    sections.push(`## Earlier messages in this thread\n${formatConversation(request.conversation)}`);
  }

  sections.push(`## Email to process\n${request.instruction}`);

  if (request.turns.length > 0) {
    sections.push(`## Steps taken so far\n${request.turns.map(formatTurn).join('\n\n')}`);
  } else {
    sections.push('## Steps taken so far\nNone yet.');
  }

  sections.push(`## Steps remaining\n${request.stepsRemaining}`);
  sections.push('Choose the next action.');

  return sections.join('\n\n');
}

function formatConversation(conversation: readonly ConversationEntry[]): string {
  return conversation.map((entry) => `[${entry.role}] ${entry.content}`).join('\n\n');
}

function formatTurn(turn: AgentTurn): string {
  const lines = [
    `Step ${turn.stepIndex + 1}: ${turn.action}`,
    `Input: ${truncate(JSON.stringify(turn.input ?? null))}`,
    `Output: ${truncate(JSON.stringify(turn.output ?? null))}`,
  ];
  if (turn.error) {
    lines.push(`Error (${turn.error.kind}): ${turn.error.message}`);
  }
  return lines.join('\n');
}

function truncate(text: string): string {
  return text.length > MAX_OUTPUT_CHARS ? `${text.slice(0, MAX_OUTPUT_CHARS)}…[truncated]` : text;
}
