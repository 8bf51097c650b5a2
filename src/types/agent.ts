import type { ActionResult } from './action-result.js';
import type { ElementLocator } from './dom.js';
import type { BrowserState } from '../dom/browser-state.js';

export interface AgentCurrentState {
  pageSummary: string;
  evaluationPreviousGoal: string;
  memory: string;
  nextGoal: string;
}

/** One requested action: the registry name plus its parameters as the reasoner sent them. */
export interface ActionInvocation {
  name: string;
  params: unknown;
}

export interface AgentOutput {
  currentState: AgentCurrentState;
  actions: ActionInvocation[];
}

export type DispatchOutcome = 'executed' | 'rejected';

/**
 * An action as the dispatcher handled it, aligned one-to-one with the
 * step's results. Rejected actions failed validation or referenced a stale
 * index and never reached the browser.
 */
export interface DispatchedAction {
  name: string;
  params: unknown;
  outcome: DispatchOutcome;
  target?: ElementLocator;
}

export interface AgentHistoryEntry {
  stepNumber: number;
  /** Null when the page could not be captured. */
  state: BrowserState | null;
  modelOutput: AgentOutput | null;
  actions: readonly DispatchedAction[];
  results: readonly ActionResult[];
  /** Validation messages of reasoner outputs rejected before the accepted one. */
  rejections: readonly string[];
  notes: readonly string[];
  /** Set when the step failed as a whole after its retries. */
  error?: string;
  timestamp: string;
  durationMs: number;
}
