import type { ActionResult } from '../types/action-result.js';
import type { AgentOutput } from '../types/agent.js';
import type { ChatMessage, ContentPart } from '../types/message.js';
import type { RenderOptions } from '../dom/element-tree.js';
import { ConfigError } from '../exception/errors.js';
import { toWire } from '../schemas/agent-output.schema.js';
import { renderStateText, type StateTextInput } from './state-message.js';
import type { SensitiveDataFilter } from './sensitive-data.js';
import { messageTokens, totalTokens, truncateToTokens, type TokenEstimator } from './token-estimator.js';

export interface ContextBudgetOptions {
  maxInputTokens: number;
  estimator: TokenEstimator;
  filter: SensitiveDataFilter;
  includeAttributes: readonly string[];
  useVision: boolean;
}

export interface ContextExtras {
  /** Planner output for this step only. */
  plan?: string;
  /** Validation feedback for a re-prompt within the same step. */
  corrections?: readonly string[];
}

export type StateTruncation = 'none' | 'text_dropped' | 'hard_cut';

export interface ContextBuild {
  messages: ChatMessage[];
  estimatedTokens: number;
  /** History groups dropped during this build. They are gone for later builds too. */
  droppedHistoryGroups: number;
  droppedScreenshot: boolean;
  stateTruncation: StateTruncation;
}

/** One completed step (or one user note) as it appears in later prompts. */
type HistoryGroup = ChatMessage[];

/**
 * Keeps the message sequence handed to the reasoner under `maxInputTokens`.
 *
 * Order: system, task, history groups (oldest first), plan, state, correction.
 * System, task and state are never dropped. When over budget the manager
 * drops the oldest history group, then the screenshot, then non-interactive
 * page text, and finally cuts the state text.
 */
export class ContextBudgetManager {
  private readonly fixed: ChatMessage[];
  private readonly fixedTokens: number;
  private readonly history: HistoryGroup[] = [];

  constructor(
    systemPrompt: string,
    task: string,
    private readonly options: ContextBudgetOptions,
  ) {
    const filter = options.filter;
    this.fixed = [
      filter.maskMessage({ role: 'system', kind: 'system', content: systemPrompt }),
      filter.maskMessage({ role: 'user', kind: 'task', content: task }),
    ];
    this.fixedTokens = totalTokens(this.fixed, options.estimator);
    if (this.fixedTokens > options.maxInputTokens) {
      throw new ConfigError(
        `System and task messages need ~${this.fixedTokens} tokens but maxInputTokens is ${options.maxInputTokens}`,
      );
    }
  }

  get historyLength(): number {
    return this.history.length;
  }

  /** Fold a finished step into the history: the model output plus what its actions produced. */
  addStep(output: AgentOutput | null, results: readonly ActionResult[]): void {
    const group: HistoryGroup = [];
    if (output) {
      group.push(this.historyMessage('assistant', JSON.stringify(toWire(output))));
    }
    const lines: string[] = [];
    results.forEach((result, i) => {
      if (result.includeInMemory && result.extractedContent) {
        lines.push(`Action result ${i + 1}/${results.length}: ${result.extractedContent}`);
      }
      if (result.error) {
        lines.push(`Action error ${i + 1}/${results.length}: ${result.error}`);
      }
    });
    if (lines.length > 0) {
      group.push(this.historyMessage('user', lines.join('\n')));
    }
    if (group.length > 0) {
      this.history.push(group);
    }
  }

  /** Text from the user, e.g. an answer given on resume. */
  addUserNote(text: string): void {
    this.history.push([this.historyMessage('user', text)]);
  }

  build(input: StateTextInput, extras: ContextExtras = {}): ContextBuild {
    const { estimator, filter, maxInputTokens } = this.options;

    let stateText = filter.mask(renderStateText(input, this.renderOptions(true)));
    let screenshot = this.options.useVision ? input.state.screenshot : undefined;
    let extraMessages = this.extraMessages(extras);

    const cost = (): number =>
      this.fixedTokens +
      this.history.reduce((sum, group) => sum + totalTokens(group, estimator), 0) +
      totalTokens(extraMessages, estimator) +
      estimator.text(stateText) +
      (screenshot ? estimator.image() : 0);

    let droppedHistoryGroups = 0;
    while (cost() > maxInputTokens && this.history.length > 0) {
      this.history.shift();
      droppedHistoryGroups++;
    }

    let droppedScreenshot = false;
    if (cost() > maxInputTokens && screenshot) {
      screenshot = undefined;
      droppedScreenshot = true;
    }

    let stateTruncation: StateTruncation = 'none';
    if (cost() > maxInputTokens) {
      stateText = filter.mask(renderStateText(input, this.renderOptions(false)));
      stateTruncation = 'text_dropped';
    }

    if (cost() > maxInputTokens) {
      const extrasTokens = totalTokens(extraMessages, estimator);
      const available = Math.max(0, maxInputTokens - this.fixedTokens - extrasTokens);
      stateText = truncateToTokens(stateText, available, estimator);
      stateTruncation = 'hard_cut';
    }

    if (cost() > maxInputTokens) {
      extraMessages = this.fitExtras(extraMessages, maxInputTokens - this.fixedTokens - estimator.text(stateText));
    }

    const state = this.stateMessage(stateText, screenshot);
    const plan = extraMessages.filter((message) => message.kind === 'plan');
    const corrections = extraMessages.filter((message) => message.kind === 'correction');
    const messages = [...this.fixed, ...this.history.flat(), ...plan, state, ...corrections];

    return {
      messages,
      estimatedTokens: totalTokens(messages, estimator),
      droppedHistoryGroups,
      droppedScreenshot,
      stateTruncation,
    };
  }

  private renderOptions(includeText: boolean): RenderOptions {
    return { includeAttributes: this.options.includeAttributes, includeText };
  }

  private historyMessage(role: 'user' | 'assistant', content: string): ChatMessage {
    return this.options.filter.maskMessage({ role, kind: 'history', content });
  }

  private extraMessages(extras: ContextExtras): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (extras.plan) {
      messages.push(
        this.options.filter.maskMessage({ role: 'user', kind: 'plan', content: `Planning hint:\n${extras.plan}` }),
      );
    }
    if (extras.corrections && extras.corrections.length > 0) {
      const content = [
        'Your previous reply was rejected. Fix these problems and answer again in the required JSON format:',
        ...extras.corrections.map((line) => `- ${line}`),
      ].join('\n');
      messages.push(this.options.filter.maskMessage({ role: 'user', kind: 'correction', content }));
    }
    return messages;
  }

  /** Corrections keep their share first; the plan gets what is left. */
  private fitExtras(messages: ChatMessage[], budget: number): ChatMessage[] {
    const { estimator } = this.options;
    const ordered = [...messages].sort((a, b) => priority(a) - priority(b));
    let remaining = Math.max(0, budget);
    const kept: ChatMessage[] = [];
    for (const message of ordered) {
      const text = typeof message.content === 'string' ? message.content : '';
      const cut = truncateToTokens(text, remaining, estimator);
      if (cut === '') continue;
      const fitted: ChatMessage = { ...message, content: cut };
      remaining -= messageTokens(fitted, estimator);
      kept.push(fitted);
    }
    return kept;
  }

  private stateMessage(text: string, screenshot: string | undefined): ChatMessage {
    if (!screenshot) {
      return { role: 'user', kind: 'state', content: text };
    }
    const content: ContentPart[] = [
      { type: 'text', text },
      { type: 'image', mediaType: 'image/png', data: screenshot },
    ];
    return { role: 'user', kind: 'state', content };
  }
}

function priority(message: ChatMessage): number {
  return message.kind === 'correction' ? 0 : 1;
}
