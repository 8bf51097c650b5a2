import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../src/metrics/collector.js';
import type { AgentEvent } from '../../src/events/event-sink.js';

const runId = 'run-1';

const events: AgentEvent[] = [
  { type: 'run_start', runId, task: 'Find a shirt', maxSteps: 10 },
  { type: 'step_start', runId, stepNumber: 1, attempt: 1 },
  { type: 'reasoner_rejected', runId, stepNumber: 1, attempt: 1, issues: ['action: Required'] },
  {
    type: 'action_result',
    runId,
    stepNumber: 1,
    actionIndex: 0,
    action: 'click_element',
    outcome: 'executed',
    result: { isDone: false, extractedContent: 'Clicked', includeInMemory: true },
  },
  {
    type: 'action_result',
    runId,
    stepNumber: 1,
    actionIndex: 1,
    action: 'input_text',
    outcome: 'rejected',
    result: { isDone: false, error: 'gone', errorKind: 'element_not_found', includeInMemory: true },
  },
  { type: 'step_end', runId, stepNumber: 1, ok: true, actions: 2, errors: [], estimatedTokens: 1200, durationMs: 30 },
  { type: 'retry', runId, stepNumber: 2, attempt: 1, kind: 'transient', delayMs: 0, error: 'timed out' },
  { type: 'retry', runId, stepNumber: 2, attempt: 2, kind: 'rate_limit', delayMs: 0, error: '429' },
  { type: 'retry', runId, stepNumber: 2, attempt: 3, kind: 'transient', delayMs: 0, error: 'timed out' },
  {
    type: 'action_result',
    runId,
    stepNumber: 2,
    actionIndex: 0,
    action: 'click_element',
    outcome: 'executed',
    result: { isDone: false, error: 'not visible', errorKind: 'action_failed', includeInMemory: true },
  },
  { type: 'step_end', runId, stepNumber: 2, ok: false, actions: 1, errors: ['not visible'], estimatedTokens: 1300, durationMs: 40 },
  { type: 'stuck', runId, stepNumber: 2, action: 'click_element', repeats: 3 },
  { type: 'user_action_required', runId, stepNumber: 2, request: { type: 'help', message: 'Solve the CAPTCHA' } },
];

describe('MetricsCollector', () => {
  it('starts empty', () => {
    const metrics = new MetricsCollector().snapshot();

    expect(metrics.state).toBe('INIT');
    expect(metrics.steps).toEqual({ total: 0, ok: 0, failed: 0 });
    expect(metrics.completedAt).toBeNull();
  });

  it('folds run events into counters', () => {
    const collector = new MetricsCollector(() => new Date('2026-01-01T00:00:00.000Z'));
    for (const event of events) collector.emit(event);

    const metrics = collector.snapshot();

    expect(metrics).toMatchObject({
      runId: 'run-1',
      task: 'Find a shirt',
      startedAt: '2026-01-01T00:00:00.000Z',
      state: 'RUNNING',
      steps: { total: 2, ok: 1, failed: 1 },
      actions: { executed: 2, rejected: 1, failed: 1 },
      rejectedOutputs: 1,
      retries: 3,
      retriesByKind: { transient: 2, rate_limit: 1 },
      stuckSignals: 1,
      userActions: 1,
      estimatedPromptTokens: 2500,
    });
  });

  it('tracks pause and completion', () => {
    let now = new Date('2026-01-01T00:00:00.000Z');
    const collector = new MetricsCollector(() => now);
    collector.emit(events[0]);

    collector.emit({ type: 'paused', runId, stepNumber: 1, reason: 'requested' });
    expect(collector.snapshot().state).toBe('PAUSED');
    collector.emit({ type: 'resumed', runId, stepNumber: 1, withAnswer: false });
    expect(collector.snapshot().state).toBe('RUNNING');

    now = new Date('2026-01-01T00:01:00.000Z');
    collector.emit({
      type: 'run_complete',
      runId,
      state: 'DONE',
      reason: 'completed',
      completed: true,
      steps: 1,
      durationMs: 60_000,
    });

    expect(collector.snapshot()).toMatchObject({
      state: 'DONE',
      reason: 'completed',
      completed: true,
      durationMs: 60_000,
      completedAt: '2026-01-01T00:01:00.000Z',
    });
  });

  it('resets on a new run', () => {
    const collector = new MetricsCollector();
    for (const event of events) collector.emit(event);

    collector.emit({ type: 'run_start', runId: 'run-2', task: 'Again', maxSteps: 1 });

    const metrics = collector.snapshot();
    expect(metrics.runId).toBe('run-2');
    expect(metrics.retries).toBe(0);
    expect(metrics.retriesByKind).toEqual({});
  });

  it('returns snapshots that later events do not change', () => {
    const collector = new MetricsCollector();
    collector.emit(events[0]);
    const before = collector.snapshot();

    collector.emit(events[5]);

    expect(before.steps.total).toBe(0);
    expect(collector.snapshot().steps.total).toBe(1);
  });
});
