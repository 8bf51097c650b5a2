import type { AgentHistory } from '../history/agent-history.js';

export type AgentRunState = 'INIT' | 'RUNNING' | 'PAUSED' | 'DONE' | 'FAILED' | 'STOPPED';

export type TerminalState = Extract<AgentRunState, 'DONE' | 'FAILED' | 'STOPPED'>;

export type TerminationReason =
  | 'completed'
  | 'max_steps_reached'
  | 'failure_budget_exhausted'
  | 'fatal_error'
  | 'stopped';

export interface RunResult {
  runId: string;
  state: TerminalState;
  reason: TerminationReason;
  /** True only when an action signalled completion. */
  completed: boolean;
  finalResult?: string;
  error?: string;
  history: AgentHistory;
  durationMs: number;
}
