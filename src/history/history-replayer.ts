import type { ActionInvocation } from '../types/agent.js';
import type { BrowserDriver } from '../engines/browser-driver.js';
import type { ActionRegistry } from '../actions/registry.js';
import { ActionDispatcher } from '../actions/dispatcher.js';
import { NullEventSink, type EventSink } from '../events/event-sink.js';
import { SensitiveDataFilter } from '../context/sensitive-data.js';
import { ElementNotFoundError, describeFailure } from '../exception/errors.js';
import type { ExportedAction, ExportedStep, HistoryExport } from '../schemas/history.schema.js';
import { withTimeout } from '../utils/async.js';
import type { RecordedAction } from './history-export.js';

export interface ReplayOptions {
  /** Secrets referenced by `<secret>` placeholders in the recorded parameters. */
  sensitiveData?: Record<string, string>;
  events?: EventSink;
  waitBetweenActionsMs?: number;
  actionTimeoutMs?: number;
  captureTimeoutMs?: number;
}

export interface StepDivergence {
  stepNumber: number;
  action: string;
  reason: string;
}

export interface ReplayResult {
  replayRunId: string;
  totalActions: number;
  /** Recorded actions that were executed again, in order. */
  executed: RecordedAction[];
  divergences: StepDivergence[];
  /** Set when the replay stopped before the end of the recording. */
  haltedAt?: { stepNumber: number; reason: string };
  overallMatch: boolean;
}

/**
 * Re-executes the action sequence of a saved History against a live
 * browser. Element actions are re-bound through the frame chain and xpath
 * recorded for their target, since highlight indices only hold for the
 * capture they came from.
 */
export class HistoryReplayer {
  constructor(
    private readonly driver: BrowserDriver,
    private readonly registry: ActionRegistry,
    private readonly options: ReplayOptions = {},
  ) {}

  async replay(data: HistoryExport): Promise<ReplayResult> {
    const replayRunId = `replay-${Date.now()}`;
    const captureTimeoutMs = this.options.captureTimeoutMs ?? 30_000;
    const dispatcher = new ActionDispatcher({
      registry: this.registry,
      driver: this.driver,
      filter: new SensitiveDataFilter(this.options.sensitiveData),
      events: this.options.events ?? new NullEventSink(),
      maxActionsPerStep: Number.POSITIVE_INFINITY,
      checkForNewElements: false,
      waitBetweenActionsMs: this.options.waitBetweenActionsMs ?? 0,
      actionTimeoutMs: this.options.actionTimeoutMs ?? 30_000,
      captureTimeoutMs,
    });

    const executed: RecordedAction[] = [];
    const divergences: StepDivergence[] = [];
    let totalActions = 0;
    let haltedAt: ReplayResult['haltedAt'];

    for (const step of data.steps) {
      const recorded = step.actions
        .map((action, i) => ({ action, result: step.results[i] }))
        .filter(({ action }) => action.outcome === 'executed');
      totalActions += recorded.length;
      if (haltedAt || recorded.length === 0) continue;

      const state = await withTimeout(
        this.driver.captureState({ screenshot: false }),
        captureTimeoutMs,
        'Page capture',
      );
      const invocations: ActionInvocation[] = [];
      for (const { action } of recorded) {
        const rebound = rebind(action, (locator) => state.findByLocator(locator)?.highlightIndex ?? null);
        if (rebound === null) {
          const error = new ElementNotFoundError(
            action.target?.index ?? -1,
            `No element matches ${action.target?.xpath ?? 'the recorded target'} on ${state.url}`,
          );
          divergences.push({
            stepNumber: step.stepNumber,
            action: action.name,
            reason: describeFailure('element_not_found', error),
          });
          haltedAt = { stepNumber: step.stepNumber, reason: error.message };
          break;
        }
        invocations.push(rebound);
      }

      const report = await dispatcher.dispatch(invocations, state, { runId: replayRunId, stepNumber: step.stepNumber });
      report.results.forEach((result, i) => {
        const original = recorded[i];
        executed.push({ stepNumber: step.stepNumber, name: original.action.name, params: original.action.params });
        const reason = compareResult(original.result, result);
        if (reason) {
          divergences.push({ stepNumber: step.stepNumber, action: original.action.name, reason });
        }
      });

      if (!haltedAt && report.results.length < invocations.length) {
        haltedAt = { stepNumber: step.stepNumber, reason: `Batch halted (${report.haltedBy ?? 'unknown'})` };
      }
    }

    return {
      replayRunId,
      totalActions,
      executed,
      divergences,
      ...(haltedAt ? { haltedAt } : {}),
      overallMatch: divergences.length === 0 && !haltedAt,
    };
  }
}

/** The invocation with its `index` pointing into the new capture; null when the target is gone. */
function rebind(
  action: ExportedAction,
  find: (locator: { xpath: string; frameChain: string[] }) => number | null,
): ActionInvocation | null {
  if (!action.target) {
    return { name: action.name, params: action.params };
  }
  const index = find(action.target);
  if (index === null) return null;
  const params = action.params !== null && typeof action.params === 'object' ? { ...action.params, index } : { index };
  return { name: action.name, params };
}

function compareResult(
  original: ExportedStep['results'][number] | undefined,
  replayed: { isDone: boolean; error?: string },
): string | null {
  if (!original) return null;
  if (Boolean(original.error) !== Boolean(replayed.error)) {
    return original.error
      ? 'Action failed originally but succeeded on replay'
      : `Action succeeded originally but failed on replay: ${replayed.error ?? ''}`;
  }
  if (original.isDone !== replayed.isDone) {
    return `isDone changed from ${original.isDone} to ${replayed.isDone}`;
  }
  return null;
}
