import type { ToolErrorKind } from '../tools/types.js';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class MalformedEventError extends AppError {
  constructor(message: string, public eventId?: string) {
    super(message, 'MALFORMED_EVENT');
    this.name = 'MalformedEventError';
  }
}

export class SubscriptionConnectionError extends AppError {
  constructor(message: string, public attempt: number) {
    super(message, 'SUBSCRIPTION_CONNECTION_ERROR', true);
    this.name = 'SubscriptionConnectionError';
  }
}

export class DispatchOverloadError extends AppError {
  constructor(public inFlight: number, public limit: number) {
    super(`Dispatch refused: ${inFlight} runs in flight (limit ${limit})`, 'DISPATCH_OVERLOAD', true);
    this.name = 'DispatchOverloadError';
  }
}

export class SessionCreationError extends AppError {
  constructor(message: string, public userId: string, public attempts: number) {
    super(message, 'SESSION_CREATION_ERROR');
    this.name = 'SessionCreationError';
  }
}

/** Not a failure: the user has to finish authorizing an app outside the run. */
export class AuthenticationPendingError extends AppError {
  constructor(public app: string, public redirectUrl?: string) {
    super(`Authorization pending for ${app}`, 'AUTHENTICATION_PENDING');
    this.name = 'AuthenticationPendingError';
  }
}

export class ToolExecutionError extends AppError {
  constructor(message: string, public kind: ToolErrorKind, public toolId?: string) {
    super(message, 'TOOL_EXECUTION_ERROR', kind === 'TIMEOUT' || kind === 'TRANSIENT');
    this.name = 'ToolExecutionError';
  }
}

export class PlanningError extends AppError {
  constructor(message: string, retryable: boolean = false) {
    super(message, 'PLANNING_ERROR', retryable);
    this.name = 'PlanningError';
  }
}

export class StepLimitExceededError extends AppError {
  constructor(public limit: number) {
    super(`Step limit of ${limit} turns exceeded`, 'STEP_LIMIT_EXCEEDED');
    this.name = 'StepLimitExceededError';
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, public timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', true);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends AppError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
