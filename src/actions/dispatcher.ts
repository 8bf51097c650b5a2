import type { ActionResult, FailureKind } from '../types/action-result.js';
import type { ActionInvocation, DispatchedAction } from '../types/agent.js';
import type { DOMElementNode } from '../types/dom.js';
import type { BrowserState } from '../dom/browser-state.js';
import type { BrowserDriver } from '../engines/browser-driver.js';
import type { EventSink } from '../events/event-sink.js';
import type { SensitiveDataFilter } from '../context/sensitive-data.js';
import { classifyError } from '../exception/classifier.js';
import { describeFailure, ElementNotFoundError, ValidationError } from '../exception/errors.js';
import { sleep as defaultSleep, withTimeout, type Sleep } from '../utils/async.js';
import type { ParsedAction } from './action-types.js';
import type { ActionRegistry } from './registry.js';

export interface DispatcherOptions {
  registry: ActionRegistry;
  driver: BrowserDriver;
  filter: SensitiveDataFilter;
  events: EventSink;
  maxActionsPerStep: number;
  checkForNewElements: boolean;
  waitBetweenActionsMs: number;
  actionTimeoutMs: number;
  /** Bounds the recapture taken for the new element check. */
  captureTimeoutMs: number;
  sleep?: Sleep;
}

export type HaltReason = 'done' | 'element_not_found' | 'action_error' | 'new_elements' | 'user_action';

export interface DispatchReport {
  /** Aligned one-to-one with `results`. */
  actions: DispatchedAction[];
  results: ActionResult[];
  notes: string[];
  haltedBy?: HaltReason;
}

export interface DispatchScope {
  runId: string;
  stepNumber: number;
}

/**
 * Runs one step's actions strictly in order against the capture the
 * reasoner saw.
 *
 * - malformed or unknown action: rejected result, the batch continues
 * - index missing from the capture: ElementNotFoundError result, the batch halts
 * - action-level error, `done`, or a request for the user: the batch halts
 * - transient, rate-limit and fatal errors propagate to the agent loop,
 *   after the failing action is recorded in the report
 *
 * Pass `report` to keep what ran before a propagating error; it is filled in place.
 */
export class ActionDispatcher {
  private readonly sleep: Sleep;

  constructor(private readonly options: DispatcherOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async dispatch(
    invocations: readonly ActionInvocation[],
    state: BrowserState,
    scope: DispatchScope,
    report: DispatchReport = { actions: [], results: [], notes: [] },
  ): Promise<DispatchReport> {
    const { maxActionsPerStep } = this.options;

    const batch = invocations.slice(0, maxActionsPerStep);
    if (invocations.length > batch.length) {
      report.notes.push(
        `Dropped ${invocations.length - batch.length} action(s) beyond the limit of ${maxActionsPerStep} per step`,
      );
    }

    let executed = 0;
    for (let i = 0; i < batch.length; i++) {
      const invocation = batch[i];

      let parsed: ParsedAction;
      try {
        parsed = this.options.registry.parse({
          name: invocation.name,
          params: this.options.filter.reveal(invocation.params),
        });
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        await this.record(report, scope, invocation, 'rejected', rejectedResult('validation', error));
        continue;
      }

      let target: DOMElementNode | undefined;
      if (parsed.index !== undefined) {
        if (i > 0 && this.options.checkForNewElements && (await this.pageGrewSince(state))) {
          report.notes.push(`Something new appeared after action ${i} / ${batch.length}`);
          report.haltedBy = 'new_elements';
          break;
        }
        try {
          target = state.resolve(state.ref(parsed.index));
        } catch (error) {
          if (!(error instanceof ElementNotFoundError)) throw error;
          await this.record(report, scope, invocation, 'rejected', rejectedResult('element_not_found', error));
          report.haltedBy = 'element_not_found';
          break;
        }
      }

      if (executed > 0 && this.options.waitBetweenActionsMs > 0) {
        await this.sleep(this.options.waitBetweenActionsMs);
      }

      const locator = target ? state.locatorOf(target) : undefined;
      let result: ActionResult;
      try {
        result = await this.execute(parsed, state, target);
      } catch (error) {
        const kind = classifyError(error);
        await this.record(report, scope, invocation, 'executed', failedResult(kind, error), locator);
        throw error;
      }
      executed++;
      await this.record(report, scope, invocation, 'executed', result, locator);

      if (result.isDone) {
        report.haltedBy = 'done';
        break;
      }
      if (result.error) {
        report.haltedBy = 'action_error';
        break;
      }
      if (result.userAction) {
        report.haltedBy = 'user_action';
        break;
      }
    }

    return report;
  }

  private async execute(
    parsed: ParsedAction,
    state: BrowserState,
    target: DOMElementNode | undefined,
  ): Promise<ActionResult> {
    const { driver, actionTimeoutMs } = this.options;
    try {
      return await withTimeout(parsed.run({ driver, state, target }), actionTimeoutMs, `Action "${parsed.name}"`);
    } catch (error) {
      const kind = classifyError(error);
      if (kind === 'element_not_found' || kind === 'action_failed' || kind === 'validation') {
        return failedResult(kind, error);
      }
      throw error;
    }
  }

  /** Whether a fresh capture shows interactive elements the batch's capture did not have. */
  private async pageGrewSince(state: BrowserState): Promise<boolean> {
    const before = state.interactiveSignature();
    const { driver, captureTimeoutMs } = this.options;
    const now = await withTimeout(driver.captureState({ screenshot: false }), captureTimeoutMs, 'Page capture');
    for (const key of now.interactiveSignature()) {
      if (!before.has(key)) return true;
    }
    return false;
  }

  private async record(
    report: DispatchReport,
    scope: DispatchScope,
    invocation: ActionInvocation,
    outcome: DispatchedAction['outcome'],
    result: ActionResult,
    target?: DispatchedAction['target'],
  ): Promise<void> {
    const action: DispatchedAction = { name: invocation.name, params: invocation.params, outcome };
    if (target) action.target = target;
    report.actions.push(action);
    report.results.push(result);
    await this.options.events.emit({
      type: 'action_result',
      runId: scope.runId,
      stepNumber: scope.stepNumber,
      actionIndex: report.results.length - 1,
      action: invocation.name,
      outcome,
      result,
    });
  }
}

function rejectedResult(kind: 'validation' | 'element_not_found', error: Error): ActionResult {
  return failedResult(kind, error);
}

function failedResult(kind: FailureKind, error: unknown): ActionResult {
  return { isDone: false, error: describeFailure(kind, error), errorKind: kind, includeInMemory: true };
}
