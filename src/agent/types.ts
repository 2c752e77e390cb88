// ============================================
// Actions chosen by the planner
// ============================================

export interface ToolCallRequest {
  toolId: string;
  input: Record<string, unknown>;
}

export type AgentAction =
  | { type: 'SEARCH'; query: string }
  | { type: 'AUTH'; app: string }
  | { type: 'EXECUTE'; calls: ToolCallRequest[] }
  | { type: 'RESPOND'; message: string }
  | { type: 'STOP'; reason?: string };

export type ActionKind = AgentAction['type'];

// ============================================
// Run state
// ============================================

export type LoopState =
  | 'PLANNING'
  | 'SEARCHING'
  | 'AUTHENTICATING'
  | 'EXECUTING'
  | 'RESPONDING'
  | 'DONE'
  | 'FAILED';

export interface TurnError {
  kind: string;
  message: string;
}

/** One iteration of the plan-act-observe loop */
export interface AgentTurn {
  stepIndex: number;
  action: ActionKind;
  input: unknown;
  output: unknown;
  error?: TurnError;
}

export type RunCondition =
  | 'StepLimitExceeded'
  | 'PlanningFailed'
  | 'ToolFailure'
  | 'SessionCreationFailed'
  | 'Cancelled';

export interface ReplyTarget {
  threadId: string;
  recipient: string;
  /** Catalog account of the monitored inbox the trigger came from */
  connectedAccountId?: string;
}

export interface ConversationEntry {
  role: 'user' | 'assistant';
  content: string;
}

export interface RunRequest {
  userId: string;
  instruction: string;
  /** Where RESPOND sends its reply; without it the message is only returned */
  replyTarget?: ReplyTarget;
  /** Earlier messages of the same thread, oldest first */
  conversation?: ConversationEntry[];
  signal?: AbortSignal;
  runId?: string;
}

export interface RunOutcome {
  runId: string;
  state: 'DONE' | 'FAILED';
  condition?: RunCondition;
  turns: AgentTurn[];
  /** Message produced by RESPOND (or the failure notice) */
  finalMessage?: string;
  reply?: { message: string; delivered: boolean };
  responseFailed: boolean;
  authorizationPending?: { app: string; redirectUrl?: string };
  error?: string;
}

// ============================================
// Planner contract
// ============================================

export interface PlanningRequest {
  instruction: string;
  turns: readonly AgentTurn[];
  conversation: readonly ConversationEntry[];
  stepsRemaining: number;
}

export interface Planner {
  nextAction(request: PlanningRequest, signal?: AbortSignal): Promise<AgentAction>;
}
