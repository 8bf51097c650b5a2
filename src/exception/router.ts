import type { FailureKind } from '../types/action-result.js';

export type RecoveryAction =
  | 'reprompt'
  | 'record_and_continue'
  | 'retry_step'
  | 'backoff_retry'
  | 'abort';

export interface RecoveryDecision {
  kind: FailureKind;
  action: RecoveryAction;
  /** Whether the run-level consecutive-failure counter is incremented. */
  countsTowardBudget: boolean;
  delayMs: number;
}

export interface RetryPolicy {
  retryDelayMs: number;
  rateLimitBaseDelayMs: number;
  rateLimitMaxDelayMs: number;
}

export interface FailureContext {
  /** 1-based attempt number of the step that just failed. */
  attempt: number;
  retryAfterMs?: number;
}

/**
 * Route a FailureKind to the recovery the agent loop applies.
 *
 * - validation: feed the error back and re-prompt within the same step
 * - element_not_found / action_failed: already recorded as an ActionResult, continue
 * - transient: retry the whole step after `retryDelayMs`
 * - rate_limit: retry the whole step after an exponential backoff
 * - fatal: abort the run
 */
export function routeFailure(
  kind: FailureKind,
  policy: RetryPolicy,
  context: FailureContext,
): RecoveryDecision {
  switch (kind) {
    case 'validation':
      return { kind, action: 'reprompt', countsTowardBudget: false, delayMs: 0 };

    case 'element_not_found':
    case 'action_failed':
      return { kind, action: 'record_and_continue', countsTowardBudget: false, delayMs: 0 };

    case 'transient':
      return { kind, action: 'retry_step', countsTowardBudget: true, delayMs: policy.retryDelayMs };

    case 'rate_limit':
      return {
        kind,
        action: 'backoff_retry',
        countsTowardBudget: true,
        delayMs: computeBackoffMs(context.attempt, policy, context.retryAfterMs),
      };

    case 'fatal':
      return { kind, action: 'abort', countsTowardBudget: true, delayMs: 0 };

    default: {
      const _exhaustive: never = kind;
      return { kind: 'fatal', action: 'abort', countsTowardBudget: true, delayMs: 0 };
    }
  }
}

/**
 * Delay before the next attempt after a rate limit. A server-provided
 * Retry-After wins; otherwise base * 2^(attempt - 1). Both are capped at the max.
 */
export function computeBackoffMs(
  attempt: number,
  policy: Pick<RetryPolicy, 'rateLimitBaseDelayMs' | 'rateLimitMaxDelayMs'>,
  retryAfterMs?: number,
): number {
  if (retryAfterMs !== undefined && retryAfterMs >= 0) {
    return Math.min(retryAfterMs, policy.rateLimitMaxDelayMs);
  }
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.rateLimitBaseDelayMs * 2 ** exponent, policy.rateLimitMaxDelayMs);
}
