export type * from './types/index.js';

// Page model
export { DomIndexer, type DomIndexerOptions } from './dom/dom-indexer.js';
export { BrowserState } from './dom/browser-state.js';
export { ElementTree, type RenderOptions } from './dom/element-tree.js';

// Context
export {
  ContextBudgetManager,
  type ContextBudgetOptions,
  type ContextBuild,
  type ContextExtras,
  type StateTruncation,
} from './context/context-budget-manager.js';
export { CharRatioEstimator, type TokenEstimator } from './context/token-estimator.js';
export { SensitiveDataFilter, placeholderFor } from './context/sensitive-data.js';
export { buildSystemPrompt, buildTaskMessage } from './context/system-prompt.js';
export { renderStateText, type StateTextInput, type StepInfo } from './context/state-message.js';

// Actions
export { ActionRegistry, defineAction } from './actions/registry.js';
export type { ActionContext, ActionDefinition, ParsedAction, RegisteredAction } from './actions/action-types.js';
export { createDefaultRegistry, type DefaultRegistryOptions } from './actions/default-registry.js';
export { createDoneAction } from './actions/builtins/control.actions.js';
export { ActionDispatcher, type DispatchReport, type HaltReason } from './actions/dispatcher.js';

// Runner
export { AgentLoop, type AgentLoopDeps } from './runner/agent-loop.js';
export { FailureBudget } from './runner/failure-budget.js';
export { StuckDetector, type StuckSignal } from './runner/stuck-detector.js';

// Errors
export * from './exception/errors.js';
export { classifyError } from './exception/classifier.js';
export { routeFailure, type RecoveryAction, type RecoveryDecision } from './exception/router.js';

// Collaborators
export type { BrowserDriver, CaptureOptions, DriverCommand, DriverOutcome } from './engines/browser-driver.js';
export { PlaywrightDriver, type PlaywrightDriverOptions } from './engines/playwright-driver.js';
export type { Planner, Reasoner } from './reasoner/reasoner.js';
export { ChatCompletionsReasoner, type ChatCompletionsOptions } from './reasoner/chat-completions.js';
export { HttpClient, HttpClientError } from './reasoner/http-client.js';

// Events, logging, metrics
export {
  CollectingEventSink,
  CompositeEventSink,
  JsonlEventSink,
  NullEventSink,
  type AgentEvent,
  type EventSink,
} from './events/event-sink.js';
export { RunLogger, type RunLoggerOptions } from './logging/run-logger.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';
export { MetricsCollector, type RunMetrics } from './metrics/collector.js';

// History
export { AgentHistory } from './history/agent-history.js';
export { actionSequence, exportHistory, loadHistory, parseHistoryExport, saveHistory } from './history/history-export.js';
export { HistoryReplayer, type ReplayOptions, type ReplayResult } from './history/history-replayer.js';
export type { HistoryExport } from './schemas/history.schema.js';

// Configuration
export { applyEnvOverrides, loadAgentConfig, resolveAgentConfig } from './config/agent-config.js';
export { AgentConfigSchema, type AgentConfig, type AgentConfigInput } from './schemas/config.schema.js';
