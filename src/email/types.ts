export interface TaskFailedParams {
  /** Plain-language reason shown to the sender */
  error: string;
  /** What was completed before the failure, if anything */
  completedSteps?: string[];
}

export interface AuthPendingParams {
  app: string;
  redirectUrl?: string;
}
