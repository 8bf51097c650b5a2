import type { AgentEvent, EventSink } from '../events/event-sink.js';
import type { AgentRunState, TerminationReason } from '../types/run.js';

export interface RunMetrics {
  runId: string;
  task: string;
  startedAt: string;
  completedAt: string | null;
  state: AgentRunState;
  reason: TerminationReason | null;
  completed: boolean;
  durationMs: number;
  steps: { total: number; ok: number; failed: number };
  actions: { executed: number; rejected: number; failed: number };
  rejectedOutputs: number;
  retries: number;
  retriesByKind: Record<string, number>;
  stuckSignals: number;
  userActions: number;
  estimatedPromptTokens: number;
}

/** Folds a run's events into counters. */
export class MetricsCollector implements EventSink {
  private metrics: RunMetrics = emptyMetrics();

  constructor(private readonly now: () => Date = () => new Date()) {}

  emit(event: AgentEvent): void {
    const m = this.metrics;
    switch (event.type) {
      case 'run_start':
        this.metrics = { ...emptyMetrics(), runId: event.runId, task: event.task, startedAt: this.now().toISOString() };
        this.metrics.state = 'RUNNING';
        return;
      case 'step_end':
        m.steps.total++;
        if (event.ok) {
          m.steps.ok++;
        } else {
          m.steps.failed++;
        }
        m.estimatedPromptTokens += event.estimatedTokens;
        return;
      case 'action_result':
        if (event.outcome === 'rejected') {
          m.actions.rejected++;
        } else {
          m.actions.executed++;
          if (event.result.error) m.actions.failed++;
        }
        return;
      case 'reasoner_rejected':
        m.rejectedOutputs++;
        return;
      case 'retry':
        m.retries++;
        m.retriesByKind[event.kind] = (m.retriesByKind[event.kind] ?? 0) + 1;
        return;
      case 'stuck':
        m.stuckSignals++;
        return;
      case 'user_action_required':
        m.userActions++;
        return;
      case 'paused':
        m.state = 'PAUSED';
        return;
      case 'resumed':
        m.state = 'RUNNING';
        return;
      case 'run_complete':
        m.state = event.state;
        m.reason = event.reason;
        m.completed = event.completed;
        m.durationMs = event.durationMs;
        m.completedAt = this.now().toISOString();
        return;
      case 'step_start':
      case 'run_error':
        return;
      default: {
        const _exhaustive: never = event;
        return _exhaustive;
      }
    }
  }

  snapshot(): RunMetrics {
    const m = this.metrics;
    return {
      ...m,
      steps: { ...m.steps },
      actions: { ...m.actions },
      retriesByKind: { ...m.retriesByKind },
    };
  }
}

function emptyMetrics(): RunMetrics {
  return {
    runId: '',
    task: '',
    startedAt: '',
    completedAt: null,
    state: 'INIT',
    reason: null,
    completed: false,
    durationMs: 0,
    steps: { total: 0, ok: 0, failed: 0 },
    actions: { executed: 0, rejected: 0, failed: 0 },
    rejectedOutputs: 0,
    retries: 0,
    retriesByKind: {},
    stuckSignals: 0,
    userActions: 0,
    estimatedPromptTokens: 0,
  };
}
