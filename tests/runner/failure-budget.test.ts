import { describe, it, expect } from 'vitest';
import { FailureBudget } from '../../src/runner/failure-budget.js';

describe('FailureBudget', () => {
  const limits = { maxConsecutiveFailures: 2, maxValidationAttempts: 3, maxStepRetries: 1 };

  it('is exhausted after the configured number of consecutive failures', () => {
    const budget = new FailureBudget(limits);
    budget.recordFailure();
    expect(budget.isExhausted()).toBe(false);
    budget.recordFailure();
    expect(budget.isExhausted()).toBe(true);
    expect(budget.consecutiveFailures).toBe(2);
  });

  it('starts over after a clean step', () => {
    const budget = new FailureBudget(limits);
    budget.recordFailure();
    budget.recordSuccess();
    budget.recordFailure();
    expect(budget.isExhausted()).toBe(false);
  });

  it('bounds re-prompts per step independently of the run counter', () => {
    const budget = new FailureBudget(limits);
    budget.recordFailure();
    expect(budget.canReprompt(2)).toBe(true);
    expect(budget.canReprompt(3)).toBe(false);
    expect(budget.consecutiveFailures).toBe(1);
  });

  it('allows the configured number of step retries', () => {
    const budget = new FailureBudget(limits);
    expect(budget.canRetryStep(1)).toBe(true);
    expect(budget.canRetryStep(2)).toBe(false);
  });
});
