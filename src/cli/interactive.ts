/**
 * interactive mode: one agent run for one instruction, result on stdout
 */

import * as readline from 'readline';
import { looksLikeHtml, stripHtml } from '../utils/html.js';
import type { Runtime } from '../runtime.js';
import type { RunOutcome } from '../agent/types.js';

export interface InteractiveArgs {
  userId?: string;
  instruction?: string;
}

export async function interactive(runtime: Runtime, args: InteractiveArgs, signal: AbortSignal): Promise<RunOutcome> {
  const { userId, instruction } = await promptForMissing(args);

  const session = await runtime.sessions.getOrCreate(userId, signal);
  const outcome = await runtime.agent.run(session, { userId, instruction, signal });

  console.log(formatOutcome(outcome));
  return outcome;
}

export function formatOutcome(outcome: RunOutcome): string {
  if (outcome.state === 'DONE') {
    if (!outcome.finalMessage) return '(finished without a reply)';
    return looksLikeHtml(outcome.finalMessage) ? stripHtml(outcome.finalMessage) : outcome.finalMessage;
  }
  return `Run failed (${outcome.condition ?? 'unknown'}): ${outcome.finalMessage ?? outcome.error ?? 'no details'}`;
}

async function promptForMissing(args: InteractiveArgs): Promise<{ userId: string; instruction: string }> {
  if (args.userId && args.instruction) {
    return { userId: args.userId, instruction: args.instruction };
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = (question: string): Promise<string> =>
    new Promise((resolve) => {
      rl.question(`${question}: `, (answer) => resolve(answer.trim()));
    });

  try {
    const userId = args.userId || (await ask('User id'));
    const instruction = args.instruction || (await ask('Instruction'));
    if (!userId || !instruction) {
      throw new Error('A user id and an instruction are required');
    }
    return { userId, instruction };
  } finally {
    rl.close();
  }
}
