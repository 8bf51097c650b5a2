export interface FailureBudgetLimits {
  /** Consecutive failed attempts after which the run fails. */
  maxConsecutiveFailures: number;
  /** Reasoner replies a single step may have rejected before it fails. */
  maxValidationAttempts: number;
  /** Extra attempts of a step after a transient or rate-limit failure. */
  maxStepRetries: number;
}

/**
 * Two independent counters: validation re-prompts are bounded per step
 * by the caller passing its own attempt count; the consecutive-failure
 * counter spans the run and resets on a clean step.
 */
export class FailureBudget {
  private consecutive = 0;

  constructor(private readonly limits: FailureBudgetLimits) {}

  get consecutiveFailures(): number {
    return this.consecutive;
  }

  get maxConsecutiveFailures(): number {
    return this.limits.maxConsecutiveFailures;
  }

  recordFailure(): void {
    this.consecutive++;
  }

  recordSuccess(): void {
    this.consecutive = 0;
  }

  isExhausted(): boolean {
    return this.consecutive >= this.limits.maxConsecutiveFailures;
  }

  /** After `rejections` rejected replies in this step, may the reasoner be asked again? */
  canReprompt(rejections: number): boolean {
    return rejections < this.limits.maxValidationAttempts;
  }

  /** After `attempt` failed attempts of this step, may it run again? */
  canRetryStep(attempt: number): boolean {
    return attempt <= this.limits.maxStepRetries;
  }

  reset(): void {
    this.consecutive = 0;
  }
}
