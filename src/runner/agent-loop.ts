import { randomUUID } from 'node:crypto';
import type { ActionResult, FailureKind, UserActionRequest } from '../types/action-result.js';
import type { AgentOutput, DispatchedAction } from '../types/agent.js';
import type { AgentRunState, RunResult, TerminalState, TerminationReason } from '../types/run.js';
import type { AgentConfig } from '../schemas/config.schema.js';
import type { BrowserState } from '../dom/browser-state.js';
import type { BrowserDriver } from '../engines/browser-driver.js';
import type { Planner, Reasoner } from '../reasoner/reasoner.js';
import type { ActionRegistry } from '../actions/registry.js';
import { ActionDispatcher, type DispatchReport } from '../actions/dispatcher.js';
import { ContextBudgetManager, type ContextExtras } from '../context/context-budget-manager.js';
import { SensitiveDataFilter } from '../context/sensitive-data.js';
import { buildSystemPrompt, buildTaskMessage } from '../context/system-prompt.js';
import type { StateTextInput } from '../context/state-message.js';
import { CharRatioEstimator, type TokenEstimator } from '../context/token-estimator.js';
import { parseAgentOutput } from '../schemas/agent-output.schema.js';
import { classifyError, retryAfterOf } from '../exception/classifier.js';
import { routeFailure } from '../exception/router.js';
import { ConfigError, describeFailure, errorMessage, ValidationError } from '../exception/errors.js';
import { NullEventSink, type AgentEvent, type EventSink } from '../events/event-sink.js';
import { AgentHistory } from '../history/agent-history.js';
import { sleep as defaultSleep, withTimeout, type Sleep } from '../utils/async.js';
import { FailureBudget } from './failure-budget.js';
import { StuckDetector, stuckHint } from './stuck-detector.js';

export interface AgentLoopDeps {
  task: string;
  driver: BrowserDriver;
  reasoner: Reasoner;
  registry: ActionRegistry;
  config: AgentConfig;
  planner?: Planner;
  events?: EventSink;
  estimator?: TokenEstimator;
  /** Appended to the built-in system prompt. */
  systemPromptExtension?: string;
  runId?: string;
  sleep?: Sleep;
  now?: () => Date;
}

type StepOutcome =
  | { kind: 'continue' }
  | { kind: 'done' }
  | { kind: 'abort'; reason: 'fatal_error' | 'failure_budget_exhausted'; error: string };

/** Raised inside a step when the reasoner used up its validation allowance. */
class RejectedOutputs extends Error {
  constructor(readonly rejections: string[]) {
    super(`Reasoner output rejected ${rejections.length} times in a row`);
  }
}

/**
 * The agent's state machine: INIT -> RUNNING -> (PAUSED <-> RUNNING) -> DONE | FAILED | STOPPED.
 *
 * Each step captures the page, builds the context, asks the reasoner,
 * dispatches the actions and appends exactly one History entry. Pause and
 * stop take effect between steps only.
 */
export class AgentLoop {
  readonly runId: string;
  private runState: AgentRunState = 'INIT';
  private readonly history: AgentHistory;
  private readonly context: ContextBudgetManager;
  private readonly dispatcher: ActionDispatcher;
  private readonly budget: FailureBudget;
  private readonly stuck: StuckDetector;
  private readonly events: EventSink;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  /** Fed into the next state message. */
  private previousResults: readonly ActionResult[] = [];
  private pendingHints: string[] = [];

  private pauseRequested = false;
  private pauseReason: 'requested' | 'user_action' = 'requested';
  private stopRequested = false;
  private answered = false;
  private release: (() => void) | null = null;

  constructor(private readonly deps: AgentLoopDeps) {
    const { config } = deps;
    this.runId = deps.runId ?? randomUUID();
    this.events = deps.events ?? new NullEventSink();
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
    this.history = new AgentHistory(deps.task);

    const filter = new SensitiveDataFilter(config.sensitiveData);
    const systemPrompt = buildSystemPrompt({
      actionDescriptions: deps.registry.describe(),
      maxActionsPerStep: config.maxActionsPerStep,
      extendWith: deps.systemPromptExtension,
    });
    this.context = new ContextBudgetManager(systemPrompt, buildTaskMessage(deps.task), {
      maxInputTokens: config.maxInputTokens,
      estimator: deps.estimator ?? new CharRatioEstimator(config.charsPerToken, config.imageTokens),
      filter,
      includeAttributes: config.includeAttributes,
      useVision: config.useVision,
    });
    this.dispatcher = new ActionDispatcher({
      registry: deps.registry,
      driver: deps.driver,
      filter,
      events: this.events,
      maxActionsPerStep: config.maxActionsPerStep,
      checkForNewElements: config.checkForNewElements,
      waitBetweenActionsMs: config.waitBetweenActionsMs,
      actionTimeoutMs: config.actionTimeoutMs,
      captureTimeoutMs: config.captureTimeoutMs,
      sleep: this.sleep,
    });
    this.budget = new FailureBudget(config);
    this.stuck = new StuckDetector(config.stuckRepeatThreshold);
  }

  get state(): AgentRunState {
    return this.runState;
  }

  /** The History so far; the same object the run result carries. */
  get currentHistory(): AgentHistory {
    return this.history;
  }

  /** Pause before the next step. The step in flight finishes first. */
  pause(): void {
    this.pauseRequested = true;
    this.pauseReason = 'requested';
  }

  /** Continue a paused run. An answer is added to the context as a user message. */
  resume(answer?: string): void {
    if (answer) {
      this.context.addUserNote(`User response: ${answer}`);
    }
    this.answered = Boolean(answer);
    this.pauseRequested = false;
    this.release?.();
  }

  /** Finish after the step in flight; the run ends STOPPED with the History so far. */
  stop(): void {
    this.stopRequested = true;
    this.release?.();
  }

  async run(maxSteps: number = this.deps.config.maxSteps): Promise<RunResult> {
    if (this.runState !== 'INIT') {
      throw new Error(`AgentLoop.run() called in state ${this.runState}; a loop runs once`);
    }
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new ConfigError(`maxSteps must be a positive integer, got ${maxSteps}`);
    }
    const started = Date.now();
    this.runState = 'RUNNING';

    try {
      await this.emit({ type: 'run_start', runId: this.runId, task: this.deps.task, maxSteps });
      for (let stepNumber = 1; ; stepNumber++) {
        await this.waitWhilePaused(stepNumber);
        if (this.stopRequested) {
          return await this.finish('STOPPED', 'stopped', started);
        }
        if (stepNumber > maxSteps) {
          return await this.finish('DONE', 'max_steps_reached', started);
        }

        const outcome = await this.step(stepNumber, maxSteps);
        if (outcome.kind === 'done') {
          return await this.finish('DONE', 'completed', started);
        }
        if (outcome.kind === 'abort') {
          return await this.finish('FAILED', outcome.reason, started, outcome.error);
        }
      }
    } catch (error) {
      return this.failRun(started, errorMessage(error));
    }
  }

  /**
   * Ends the run on a failure outside the step policy, e.g. an event sink
   * that cannot write. The result is returned even if the sink fails again.
   */
  private async failRun(started: number, error: string): Promise<RunResult> {
    this.runState = 'FAILED';
    try {
      const stepNumber = this.history.length;
      await this.emit({ type: 'run_error', runId: this.runId, stepNumber, kind: 'fatal', error });
      return await this.finish('FAILED', 'fatal_error', started, error);
    } catch (sinkError) {
      const reported = `${error}; event sink failed: ${errorMessage(sinkError)}`;
      return this.result('FAILED', 'fatal_error', Date.now() - started, reported);
    }
  }

  private async step(stepNumber: number, maxSteps: number): Promise<StepOutcome> {
    const started = Date.now();
    let state: BrowserState | null = null;
    let output: AgentOutput | null = null;
    let rejections: string[] = [];
    // What interrupted attempts already did to the page.
    const carried: { actions: DispatchedAction[]; results: ActionResult[]; notes: string[] } = {
      actions: [],
      results: [],
      notes: [],
    };

    for (let attempt = 1; ; attempt++) {
      await this.emit({ type: 'step_start', runId: this.runId, stepNumber, attempt });
      state = null;
      output = null;
      rejections = [];
      let report: DispatchReport | null = null;

      try {
        const { config } = this.deps;
        state = await withTimeout(
          this.deps.driver.captureState({ screenshot: config.useVision }),
          config.captureTimeoutMs,
          'Page capture',
        );
        const input: StateTextInput = {
          state,
          step: { stepNumber, maxSteps },
          previousResults: [...this.previousResults, ...carried.results],
          hints: this.pendingHints,
          now: this.now(),
        };

        const plan = await this.planIfDue(stepNumber, input);
        const decided = await this.decide(stepNumber, attempt, input, plan);
        output = decided.output;
        rejections = decided.rejections;

        report = { actions: [], results: [], notes: [] };
        await this.dispatcher.dispatch(output.actions, state, { runId: this.runId, stepNumber }, report);
        const notes = [...carried.notes, ...report.notes];
        if (rejections.length > 0) {
          notes.unshift(`Reasoner output rejected ${rejections.length} time(s) before this one was accepted`);
        }
        const actions = [...carried.actions, ...report.actions];
        const results = [...carried.results, ...report.results];

        this.record({ stepNumber, state, output, actions, results, rejections, notes, started });
        this.previousResults = results;
        this.pendingHints = [...report.notes];

        const signal = this.stuck.observe(report.actions, report.results);
        if (signal) {
          const { action, repeats } = signal;
          await this.emit({ type: 'stuck', runId: this.runId, stepNumber, action, repeats });
          this.pendingHints.push(stuckHint(signal));
          if (signal.kind === 'repeated_failure') {
            this.budget.recordFailure();
          }
        }

        const failed = report.results.filter((result) => result.error);
        if (failed.length === 0) {
          this.budget.recordSuccess();
        }
        const errors = results.flatMap((result) => (result.error ? [result.error] : []));
        await this.emit({
          type: 'step_end',
          runId: this.runId,
          stepNumber,
          ok: errors.length === 0,
          actions: actions.length,
          errors,
          estimatedTokens: decided.estimatedTokens,
          durationMs: Date.now() - started,
        });

        if (failed.length > 0 && this.budget.isExhausted()) {
          const kind = failed[0].errorKind ?? 'action_failed';
          const error = failed[0].error ?? '';
          await this.emit({ type: 'run_error', runId: this.runId, stepNumber, kind, error });
          return { kind: 'abort', reason: 'failure_budget_exhausted', error: this.exhaustedMessage(error) };
        }

        const userAction = report.results.find((result) => result.userAction)?.userAction;
        if (userAction) {
          await this.requestUser(stepNumber, userAction);
        }

        return report.haltedBy === 'done' ? { kind: 'done' } : { kind: 'continue' };
      } catch (error) {
        if (error instanceof RejectedOutputs) {
          this.budget.recordFailure();
          const { rejections: rejected, message } = error;
          return this.failStep(stepNumber, state, null, rejected, message, 'validation', started, carried);
        }

        const kind = classifyError(error);
        const decision = routeFailure(kind, this.deps.config, { attempt, retryAfterMs: retryAfterOf(error) });
        const message = describeFailure(kind, error);

        if (report && report.actions.length > 0) {
          carried.actions.push(...report.actions);
          carried.results.push(...report.results);
          const ran = report.actions.length;
          carried.notes.push(`Attempt ${attempt} was interrupted after ${ran} action(s): ${message}`);
        }
        if (decision.countsTowardBudget) {
          this.budget.recordFailure();
        }

        switch (decision.action) {
          case 'abort':
            return this.failStep(
              stepNumber,
              state,
              output,
              rejections,
              message,
              kind,
              started,
              carried,
              'fatal_error',
            );
          case 'retry_step':
          case 'backoff_retry':
            if (!this.budget.isExhausted() && this.budget.canRetryStep(attempt)) {
              await this.retryAfter(stepNumber, attempt, kind, decision.delayMs, message);
              continue;
            }
            return this.failStep(stepNumber, state, output, rejections, message, kind, started, carried);
          case 'reprompt':
            // A validation error outside the reasoner exchange, e.g. a malformed page capture.
            if (this.budget.canReprompt(attempt)) {
              await this.retryAfter(stepNumber, attempt, kind, decision.delayMs, message);
              continue;
            }
            this.budget.recordFailure();
            return this.failStep(stepNumber, state, output, rejections, message, kind, started, carried);
          case 'record_and_continue':
            return this.failStep(stepNumber, state, output, rejections, message, kind, started, carried);
          default: {
            const _exhaustive: never = decision.action;
            return _exhaustive;
          }
        }
      }
    }
  }

  private async retryAfter(
    stepNumber: number,
    attempt: number,
    kind: FailureKind,
    delayMs: number,
    error: string,
  ): Promise<void> {
    await this.emit({ type: 'retry', runId: this.runId, stepNumber, attempt, kind, delayMs, error });
    if (delayMs > 0) {
      await this.sleep(delayMs);
    }
  }

  /**
   * Ask the reasoner until a reply validates. Each rejection is fed back as
   * a correction; the allowance is per step and separate from the run's
   * failure budget.
   */
  private async decide(
    stepNumber: number,
    attempt: number,
    input: StateTextInput,
    plan: string | undefined,
  ): Promise<{ output: AgentOutput; rejections: string[]; estimatedTokens: number }> {
    const rejections: string[] = [];
    let corrections: string[] = [];

    for (;;) {
      const extras: ContextExtras = { plan, corrections };
      const build = this.context.build(input, extras);
      try {
        const raw = await withTimeout(
          this.deps.reasoner.invoke(build.messages),
          this.deps.config.reasonerTimeoutMs,
          'Reasoner call',
        );
        return { output: parseAgentOutput(raw), rejections, estimatedTokens: build.estimatedTokens };
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        rejections.push(error.message);
        await this.emit({
          type: 'reasoner_rejected',
          runId: this.runId,
          stepNumber,
          attempt,
          issues: error.issues.length > 0 ? error.issues : [error.message],
        });
        if (!this.budget.canReprompt(rejections.length)) {
          throw new RejectedOutputs(rejections);
        }
        corrections = error.issues.length > 0 ? error.issues : [error.message];
      }
    }
  }

  private async planIfDue(stepNumber: number, input: StateTextInput): Promise<string | undefined> {
    const { planner, config } = this.deps;
    if (!planner || config.planningInterval <= 0) return undefined;
    if ((stepNumber - 1) % config.planningInterval !== 0) return undefined;
    const build = this.context.build(input);
    const plan = await planner.plan(build.messages);
    return plan.trim() === '' ? undefined : plan;
  }

  /** Record a step that failed as a whole and decide whether the run goes on. */
  private async failStep(
    stepNumber: number,
    state: BrowserState | null,
    output: AgentOutput | null,
    rejections: string[],
    error: string,
    kind: FailureKind,
    started: number,
    carried: { actions: DispatchedAction[]; results: ActionResult[]; notes: string[] },
    abortReason?: 'fatal_error',
  ): Promise<StepOutcome> {
    const { actions, results, notes } = carried;
    this.record({ stepNumber, state, output, actions, results, rejections, notes, started, error });
    this.context.addStep(output, [{ isDone: false, error, errorKind: kind, includeInMemory: true }]);
    this.previousResults = [];
    this.pendingHints = [`Step ${stepNumber} failed: ${error}`];
    this.stuck.reset();

    await this.emit({
      type: 'step_end',
      runId: this.runId,
      stepNumber,
      ok: false,
      actions: actions.length,
      errors: [error],
      estimatedTokens: 0,
      durationMs: Date.now() - started,
    });

    if (abortReason || this.budget.isExhausted()) {
      await this.emit({ type: 'run_error', runId: this.runId, stepNumber, kind, error });
      return {
        kind: 'abort',
        reason: abortReason ?? 'failure_budget_exhausted',
        error: abortReason ? error : this.exhaustedMessage(error),
      };
    }
    return { kind: 'continue' };
  }

  private exhaustedMessage(error: string): string {
    const { consecutiveFailures, maxConsecutiveFailures } = this.budget;
    return `${consecutiveFailures} consecutive failures (limit ${maxConsecutiveFailures}): ${error}`;
  }

  private record(entry: {
    stepNumber: number;
    state: BrowserState | null;
    output: AgentOutput | null;
    actions: readonly DispatchedAction[];
    results: readonly ActionResult[];
    rejections: string[];
    notes: string[];
    started: number;
    error?: string;
  }): void {
    this.history.append({
      stepNumber: entry.stepNumber,
      state: entry.state,
      modelOutput: entry.output,
      actions: entry.actions,
      results: entry.results,
      rejections: entry.rejections,
      notes: entry.notes,
      timestamp: this.now().toISOString(),
      durationMs: Date.now() - entry.started,
      ...(entry.error ? { error: entry.error } : {}),
    });
    if (!entry.error) {
      this.context.addStep(entry.output, entry.results);
    }
  }

  private async requestUser(stepNumber: number, request: UserActionRequest): Promise<void> {
    await this.emit({ type: 'user_action_required', runId: this.runId, stepNumber, request });
    if (this.deps.config.pauseOnUserAction) {
      this.pauseRequested = true;
      this.pauseReason = 'user_action';
    }
  }

  private async waitWhilePaused(nextStep: number): Promise<void> {
    if (!this.pauseRequested || this.stopRequested) return;

    this.runState = 'PAUSED';
    await this.emit({ type: 'paused', runId: this.runId, stepNumber: nextStep, reason: this.pauseReason });
    while (this.pauseRequested && !this.stopRequested) {
      await new Promise<void>((resolve) => {
        this.release = resolve;
      });
      this.release = null;
    }
    this.runState = 'RUNNING';
    if (!this.stopRequested) {
      await this.emit({ type: 'resumed', runId: this.runId, stepNumber: nextStep, withAnswer: this.answered });
    }
  }

  private async finish(
    state: TerminalState,
    reason: TerminationReason,
    started: number,
    error?: string,
  ): Promise<RunResult> {
    this.runState = state;
    const durationMs = Date.now() - started;
    await this.emit({
      type: 'run_complete',
      runId: this.runId,
      state,
      reason,
      completed: reason === 'completed',
      steps: this.history.length,
      durationMs,
    });
    return this.result(state, reason, durationMs, error);
  }

  private result(state: TerminalState, reason: TerminationReason, durationMs: number, error?: string): RunResult {
    const completed = reason === 'completed';
    const finalResult = completed ? this.history.finalResult() : undefined;
    return {
      runId: this.runId,
      state,
      reason,
      completed,
      ...(finalResult !== undefined ? { finalResult } : {}),
      ...(error !== undefined ? { error } : {}),
      history: this.history,
      durationMs,
    };
  }

  private async emit(event: AgentEvent): Promise<void> {
    await this.events.emit(event);
  }
}
