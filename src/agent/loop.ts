/**
 * Agent Loop - plan-act-observe state machine
 *
 * PLANNING → {SEARCHING, AUTHENTICATING, EXECUTING} → RESPONDING → DONE,
 * with FAILED reachable from every state. Each iteration asks the planner
 * for one action, runs it against the catalog, records an AgentTurn and
 * goes back to planning. The number of turns is capped by `stepLimit`.
 */

import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import {
  AuthenticationPendingError,
  CancelledError,
  PlanningError,
  SessionCreationError,
  StepLimitExceededError,
  ToolExecutionError,
  errorMessage,
  isRetryable,
} from '../utils/errors.js';
import { backoffDelay, retry, sleep, throwIfAborted, type SleepFn } from '../utils/retry.js';
import { isExpired, type Session, type SessionProvider } from '../session/types.js';
import type { ToolRegistryClient } from '../tools/registry-client.js';
import { classifyError } from '../tools/registry-client.js';
import {
  failedResult,
  isRetryableResult,
  type ExecutionResult,
  type ToolDescriptor,
} from '../tools/types.js';
import { authPendingTemplate } from '../email/templates/auth-pending.js';
import { taskFailedTemplate } from '../email/templates/task-failed.js';
import type {
  ActionKind,
  AgentAction,
  AgentTurn,
  LoopState,
  Planner,
  ReplyTarget,
  RunCondition,
  RunOutcome,
  RunRequest,
  ToolCallRequest,
  TurnError,
} from './types.js';

/** Sends the run's reply; implemented by ResponseDispatcher */
export interface Replier {
  reply(session: Session, target: ReplyTarget, message: string, signal?: AbortSignal): Promise<ExecutionResult>;
}

export interface AgentLoopDeps {
  planner: Planner;
  registry: ToolRegistryClient;
  sessions: SessionProvider;
  dispatcher?: Replier;
}

export interface AgentLoopOptions {
  /** Hard cap on turns per run */
  stepLimit: number;
  /** Attempts per tool call when failures are retryable */
  executeMaxAttempts: number;
  /** Consecutive planner attempts before the run fails (default 2) */
  planningAttempts?: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  sleep?: SleepFn;
}

export class AgentLoop {
  constructor(
    private readonly deps: AgentLoopDeps,
    private readonly options: AgentLoopOptions
  ) {}

  run(session: Session, request: RunRequest): Promise<RunOutcome> {
    return new AgentRun(this.deps, this.options, session, request).execute();
  }
}

class AgentRun {
  private readonly runId: string;
  private readonly turns: AgentTurn[] = [];
  private readonly discovered = new Map<string, ToolDescriptor>();
  private readonly signal?: AbortSignal;
  private readonly wait: SleepFn;
  private state: LoopState = 'PLANNING';
  private responded = false;
  private finalMessage?: string;
  private reply?: { message: string; delivered: boolean };
  private authorizationPending?: { app: string; redirectUrl?: string };

  constructor(
    private readonly deps: AgentLoopDeps,
    private readonly options: AgentLoopOptions,
    private session: Session,
    private readonly request: RunRequest
  ) {
    this.runId = request.runId ?? randomUUID();
    this.signal = request.signal;
    this.wait = options.sleep ?? sleep;
  }

  async execute(): Promise<RunOutcome> {
    logger.info({ runId: this.runId, userId: this.request.userId }, 'Agent run started');
    try {
      await this.loop();
      return this.finish();
    } catch (error) {
      return this.fail(error);
    }
  }

  private async loop(): Promise<void> {
    const planningAttempts = this.options.planningAttempts ?? 2;
    let planningFailures = 0;

    for (;;) {
      throwIfAborted(this.signal);
      this.assertBudget();
      this.transition('PLANNING');

      let action: AgentAction;
      try {
        action = await this.deps.planner.nextAction(
          {
            instruction: this.request.instruction,
            turns: this.turns,
            conversation: this.request.conversation ?? [],
            stepsRemaining: this.options.stepLimit - this.turns.length,
          },
          this.signal
        );
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        planningFailures++;
        logger.warn(
          { runId: this.runId, attempt: planningFailures, error: errorMessage(error) },
          'Planning step failed'
        );
        if (planningFailures >= planningAttempts) {
          throw error instanceof PlanningError ? error : new PlanningError(errorMessage(error));
        }
        continue;
      }
      planningFailures = 0;

      try {
        if (await this.act(action)) return;
      } catch (error) {
        if (!(error instanceof AuthenticationPendingError)) throw error;
        await this.respondAuthorizationPending(error);
        return;
      }
    }
  }

  /** Run one action; true when the run is finished. */
  private async act(action: AgentAction): Promise<boolean> {
    switch (action.type) {
      case 'SEARCH':
        await this.search(action.query);
        return false;
      case 'AUTH':
        await this.authenticate(action.app);
        return false;
      case 'EXECUTE':
        await this.executeCalls(action.calls);
        return false;
      case 'RESPOND':
        await this.respond(action.message);
        return true;
      case 'STOP':
        this.appendTurn('STOP', { reason: action.reason ?? null }, null);
        return true;
      default:
        return assertNever(action);
    }
  }

  // ============================================
  // Actions
  // ============================================

  private async search(query: string): Promise<void> {
    this.transition('SEARCHING');
    const tools = await this.catalogCall('SEARCH', { query }, (session, signal) =>
      this.deps.registry.searchTools(session, query, signal)
    );

    for (const tool of tools) {
      this.discovered.set(tool.toolId, tool);
    }

    this.appendTurn(
      'SEARCH',
      { query },
      tools.map((tool) => ({
        toolId: tool.toolId,
        app: tool.app,
        requiresConnection: tool.requiredConnection !== undefined,
        inputSchema: tool.inputSchema,
      }))
    );
  }

  /** Throws AuthenticationPendingError when the user still has to act. */
  private async authenticate(app: string): Promise<void> {
    this.transition('AUTHENTICATING');
    this.assertBudget();

    const connection = await this.catalogCall('AUTH', { app }, (session, signal) =>
      this.deps.registry.requestConnection(session, app, signal)
    );

    this.appendTurn('AUTH', { app }, {
      connectionId: connection.connectionId,
      authState: connection.authState,
      redirectUrl: connection.redirectUrl ?? null,
    });

    if (connection.authState !== 'AUTHORIZED') {
      throw new AuthenticationPendingError(app, connection.redirectUrl);
    }
  }

  private async executeCalls(calls: ToolCallRequest[]): Promise<void> {
    this.transition('EXECUTING');

    const results: Array<ExecutionResult | undefined> = calls.map((call) =>
      this.discovered.has(call.toolId)
        ? undefined
        : failedResult(call.toolId, 'UNKNOWN_TOOL', 'Tool was not returned by a search in this run; SEARCH first')
    );
    const runnable = calls.flatMap((call, index) => {
      const tool = this.discovered.get(call.toolId);
      return tool ? [{ index, tool, input: call.input }] : [];
    });

    // Never execute against a connection that is not authorized
    const required = new Set(runnable.flatMap(({ tool }) => (tool.requiredConnection ? [tool.requiredConnection] : [])));
    for (const app of required) {
      const connection = await this.catalogCall('EXECUTE', { app }, (session, signal) =>
        this.deps.registry.checkConnection(session, app, signal)
      );
      if (connection.authState !== 'AUTHORIZED') {
        logger.info({ runId: this.runId, app }, 'Connection not authorized, authenticating before execution');
        await this.authenticate(app);
        this.transition('EXECUTING');
      }
    }

    this.assertBudget();

    let pending = runnable;
    for (let attempt = 1; pending.length > 0; attempt++) {
      throwIfAborted(this.signal);
      const session = await this.currentSession();
      const batch = await this.deps.registry.executeTools(
        session,
        pending.map(({ tool, input }) => ({ tool, input })),
        this.signal
      );

      const retryNext: typeof pending = [];
      pending.forEach((item, position) => {
        const result = batch[position] ?? failedResult(item.tool.toolId, 'UNKNOWN', 'No result returned');
        results[item.index] = result;
        if (isRetryableResult(result) && attempt < this.options.executeMaxAttempts) {
          retryNext.push(item);
        }
      });

      if (retryNext.length > 0) {
        const delayMs = backoffDelay(attempt, {
          baseDelayMs: this.options.retryBaseDelayMs,
          maxDelayMs: this.options.retryMaxDelayMs,
        });
        logger.warn(
          { runId: this.runId, attempt, tools: retryNext.map((item) => item.tool.toolId), delayMs },
          'Retryable tool failure, retrying'
        );
        await this.wait(delayMs, this.signal);
      }
      pending = retryNext;
    }

    const final = results.map((result, index) => result ?? failedResult(calls[index].toolId, 'UNKNOWN'));
    const failures = final.filter((result) => !result.success);
    this.appendTurn(
      'EXECUTE',
      { calls },
      final,
      failures.length > 0
        ? { kind: 'ToolExecutionError', message: `${failures.length} of ${final.length} tool calls failed` }
        : undefined
    );
  }

  /** `budgeted: false` lets the authorization-pending reply follow an AUTH on the last step. */
  private async respond(message: string, budgeted = true): Promise<void> {
    this.transition('RESPONDING');
    if (this.responded) {
      throw new Error('A run may respond only once');
    }
    if (budgeted) this.assertBudget();
    this.responded = true;
    this.finalMessage = message;

    const { dispatcher } = this.deps;
    const target = this.request.replyTarget;
    if (!dispatcher || !target) {
      this.appendTurn('RESPOND', { message }, { delivered: false, reason: 'no reply channel' }, undefined, budgeted);
      return;
    }

    const result = await this.sendReply(dispatcher, target, message, this.options.executeMaxAttempts);
    this.reply = { message, delivered: result.success };
    this.appendTurn(
      'RESPOND',
      { message },
      result,
      result.success ? undefined : { kind: result.errorKind, message: result.message ?? 'Reply could not be sent' },
      budgeted
    );
  }

  private async respondAuthorizationPending(pending: AuthenticationPendingError): Promise<void> {
    this.authorizationPending = { app: pending.app, redirectUrl: pending.redirectUrl };
    logger.info({ runId: this.runId, app: pending.app }, 'Authorization pending, replying and stopping');
    await this.respond(authPendingTemplate({ app: pending.app, redirectUrl: pending.redirectUrl }), false);
  }

  // ============================================
  // Plumbing
  // ============================================

  private async sendReply(
    dispatcher: Replier,
    target: ReplyTarget,
    message: string,
    maxAttempts: number
  ): Promise<ExecutionResult> {
    for (let attempt = 1; ; attempt++) {
      let result: ExecutionResult;
      try {
        const session = await this.currentSession();
        result = await dispatcher.reply(session, target, message, this.signal);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        result = failedResult('reply', classifyError(error), errorMessage(error));
      }

      if (result.success || !isRetryableResult(result) || attempt >= maxAttempts) {
        return result;
      }
      await this.wait(
        backoffDelay(attempt, { baseDelayMs: this.options.retryBaseDelayMs, maxDelayMs: this.options.retryMaxDelayMs }),
        this.signal
      );
    }
  }

  /**
   * Catalog round-trip with bounded retry for retryable failures. A failure
   * that survives the retries is recorded as a turn and ends the run.
   */
  private async catalogCall<T>(
    action: ActionKind,
    input: unknown,
    call: (session: Session, signal?: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      return await retry(async () => call(await this.currentSession(), this.signal), {
        maxAttempts: this.options.executeMaxAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        signal: this.signal,
        sleep: this.wait,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, delayMs) => {
          logger.warn({ runId: this.runId, action, attempt, delayMs, error: errorMessage(error) }, 'Catalog call failed, retrying');
        },
      });
    } catch (error) {
      if (error instanceof CancelledError || error instanceof SessionCreationError) throw error;
      const kind = error instanceof ToolExecutionError ? error.kind : classifyError(error);
      if (this.turns.length < this.options.stepLimit) {
        this.appendTurn(action, input, null, { kind, message: errorMessage(error) });
      }
      throw error instanceof ToolExecutionError ? error : new ToolExecutionError(errorMessage(error), kind);
    }
  }

  /** The borrowed session is never used past its expiry. */
  private async currentSession(): Promise<Session> {
    if (isExpired(this.session)) {
      logger.info({ runId: this.runId, userId: this.request.userId }, 'Session expired mid-run, re-acquiring');
      this.session = await this.deps.sessions.getOrCreate(this.request.userId, this.signal);
    }
    return this.session;
  }

  private assertBudget(): void {
    if (this.turns.length >= this.options.stepLimit) {
      throw new StepLimitExceededError(this.options.stepLimit);
    }
  }

  private appendTurn(action: ActionKind, input: unknown, output: unknown, error?: TurnError, budgeted = true): void {
    if (budgeted) this.assertBudget();
    this.turns.push({ stepIndex: this.turns.length, action, input, output, error });
  }

  private transition(next: LoopState): void {
    if (this.state !== next) {
      logger.debug({ runId: this.runId, from: this.state, to: next }, 'Agent state transition');
      this.state = next;
    }
  }

  // ============================================
  // Outcomes
  // ============================================

  private finish(): RunOutcome {
    this.transition('DONE');
    const outcome = this.outcome('DONE');
    logger.info(
      { runId: this.runId, turns: this.turns.length, responseFailed: outcome.responseFailed },
      'Agent run completed'
    );
    return outcome;
  }

  private async fail(error: unknown): Promise<RunOutcome> {
    this.transition('FAILED');
    const condition = conditionFor(error);

    if (condition === 'Cancelled') {
      logger.info({ runId: this.runId, turns: this.turns.length }, 'Agent run cancelled');
      return this.outcome('FAILED', condition, errorMessage(error));
    }

    logger.error(
      { runId: this.runId, condition, turns: this.turns.length, error: errorMessage(error) },
      'Agent run failed'
    );

    const reason = describeFailure(condition, error, this.options.stepLimit);
    this.finalMessage = reason;
    if (!this.responded) {
      await this.sendFailureNotice(reason);
    }
    return this.outcome('FAILED', condition, errorMessage(error));
  }

  /** One plain-language notice to the sender; outside the step budget. */
  private async sendFailureNotice(reason: string): Promise<void> {
    const { dispatcher } = this.deps;
    const target = this.request.replyTarget;
    if (!dispatcher || !target) return;

    this.responded = true;
    const message = taskFailedTemplate({ error: reason, completedSteps: this.completedSteps() });
    try {
      const result = await this.sendReply(dispatcher, target, message, 1);
      this.reply = { message, delivered: result.success };
    } catch (error) {
      logger.warn({ runId: this.runId, error: errorMessage(error) }, 'Failure notice could not be sent');
      this.reply = { message, delivered: false };
    }
  }

  private completedSteps(): string[] {
    return this.turns.flatMap((turn) => {
      if (turn.action !== 'EXECUTE' || !Array.isArray(turn.output)) return [];
      return turn.output.flatMap((result: unknown) =>
        isSuccessfulResult(result) ? [`Ran ${result.toolId}`] : []
      );
    });
  }

  private outcome(state: 'DONE' | 'FAILED', condition?: RunCondition, error?: string): RunOutcome {
    return {
      runId: this.runId,
      state,
      condition,
      turns: [...this.turns],
      finalMessage: this.finalMessage,
      reply: this.reply,
      responseFailed: this.reply !== undefined && !this.reply.delivered,
      authorizationPending: this.authorizationPending,
      error,
    };
  }
}

function conditionFor(error: unknown): RunCondition {
  if (error instanceof CancelledError) return 'Cancelled';
  if (error instanceof StepLimitExceededError) return 'StepLimitExceeded';
  if (error instanceof PlanningError) return 'PlanningFailed';
  if (error instanceof SessionCreationError) return 'SessionCreationFailed';
  return 'ToolFailure';
}

function describeFailure(condition: RunCondition, error: unknown, stepLimit: number): string {
  switch (condition) {
    case 'StepLimitExceeded':
      return `I could not finish the task within the limit of ${stepLimit} steps.`;
    case 'PlanningFailed':
      return 'I could not work out how to act on your request. Please rephrase it.';
    case 'SessionCreationFailed':
      return 'I could not open a session with the tool service. Please try again later.';
    case 'ToolFailure':
      return `A service I needed did not respond correctly: ${errorMessage(error)}`;
    case 'Cancelled':
      return 'The assistant was shut down before your request was finished.';
  }
}

function isSuccessfulResult(value: unknown): value is { toolId: string; success: true } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === true &&
    'toolId' in value &&
    typeof value.toolId === 'string'
  );
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`);
}
