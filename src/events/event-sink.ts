import type { Writable } from 'node:stream';
import type { ActionResult, FailureKind, UserActionRequest } from '../types/action-result.js';
import type { DispatchOutcome } from '../types/agent.js';
import type { AgentRunState, TerminationReason } from '../types/run.js';

export type AgentEvent =
  | { type: 'run_start'; runId: string; task: string; maxSteps: number }
  | { type: 'step_start'; runId: string; stepNumber: number; attempt: number }
  | { type: 'reasoner_rejected'; runId: string; stepNumber: number; attempt: number; issues: string[] }
  | {
      type: 'action_result';
      runId: string;
      stepNumber: number;
      actionIndex: number;
      action: string;
      outcome: DispatchOutcome;
      result: ActionResult;
    }
  | {
      type: 'step_end';
      runId: string;
      stepNumber: number;
      ok: boolean;
      actions: number;
      errors: string[];
      estimatedTokens: number;
      durationMs: number;
    }
  | {
      type: 'retry';
      runId: string;
      stepNumber: number;
      attempt: number;
      kind: FailureKind;
      delayMs: number;
      error: string;
    }
  | { type: 'stuck'; runId: string; stepNumber: number; action: string; repeats: number }
  | { type: 'paused'; runId: string; stepNumber: number; reason: 'requested' | 'user_action' }
  | { type: 'resumed'; runId: string; stepNumber: number; withAnswer: boolean }
  | { type: 'user_action_required'; runId: string; stepNumber: number; request: UserActionRequest }
  | {
      type: 'run_complete';
      runId: string;
      state: AgentRunState;
      reason: TerminationReason;
      completed: boolean;
      steps: number;
      durationMs: number;
    }
  | { type: 'run_error'; runId: string; stepNumber: number; kind: FailureKind; error: string };

export type AgentEventType = AgentEvent['type'];

/**
 * Receives every event of a run. Passed in at construction; the agent
 * awaits each emit, so a failing sink fails the run instead of being ignored.
 */
export interface EventSink {
  emit(event: AgentEvent): void | Promise<void>;
}

export class NullEventSink implements EventSink {
  emit(): void {}
}

export class CollectingEventSink implements EventSink {
  readonly events: AgentEvent[] = [];

  emit(event: AgentEvent): void {
    this.events.push(event);
  }

  ofType<T extends AgentEventType>(type: T): Extract<AgentEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<AgentEvent, { type: T }> => event.type === type);
  }
}

export class CompositeEventSink implements EventSink {
  private readonly sinks: EventSink[];

  constructor(sinks: EventSink[]) {
    this.sinks = sinks;
  }

  async emit(event: AgentEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink.emit(event);
    }
  }
}

/** One JSON object per line, e.g. on stdout for a supervising process. */
export class JsonlEventSink implements EventSink {
  constructor(
    private readonly out: Writable,
    private readonly now: () => Date = () => new Date(),
  ) {}

  emit(event: AgentEvent): void {
    this.out.write(JSON.stringify({ timestamp: this.now().toISOString(), ...event }) + '\n');
  }
}
