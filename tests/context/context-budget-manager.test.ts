import { describe, it, expect } from 'vitest';
import { ContextBudgetManager, type ContextBudgetOptions } from '../../src/context/context-budget-manager.js';
import { renderStateText, type StateTextInput } from '../../src/context/state-message.js';
import { SensitiveDataFilter } from '../../src/context/sensitive-data.js';
import { CharRatioEstimator } from '../../src/context/token-estimator.js';
import { DomIndexer } from '../../src/dom/dom-indexer.js';
import { ConfigError } from '../../src/exception/errors.js';
import type { AgentOutput } from '../../src/types/agent.js';
import { button, el, page, text } from '../helpers/fakes.js';

const indexer = new DomIndexer({ viewportExpansion: 500 });
const now = new Date('2026-03-04T05:06:07Z');
// One token per character keeps the arithmetic readable.
const estimator = new CharRatioEstimator(1, 100);

function options(maxInputTokens: number, overrides: Partial<ContextBudgetOptions> = {}): ContextBudgetOptions {
  return {
    maxInputTokens,
    estimator,
    filter: new SensitiveDataFilter(),
    includeAttributes: ['type', 'value'],
    useVision: false,
    ...overrides,
  };
}

function input(children = [button('/html/body/button', 'Go')], screenshot?: string): StateTextInput {
  return {
    state: indexer.index(page(children, { screenshot })),
    step: { stepNumber: 1, maxSteps: 5 },
    previousResults: [],
    now,
  };
}

const output: AgentOutput = {
  currentState: { pageSummary: '', evaluationPreviousGoal: 'Success', memory: 'm', nextGoal: 'click' },
  actions: [{ name: 'click_element', params: { index: 1 } }],
};

describe('ContextBudgetManager', () => {
  it('orders system, task, history, plan, state, correction', () => {
    const manager = new ContextBudgetManager('S', 'T', options(100_000));
    manager.addStep(output, [{ isDone: false, extractedContent: 'Clicked', includeInMemory: true }]);

    const build = manager.build(input(), { plan: 'open the cart', corrections: ['action: Required'] });

    expect(build.messages.map((m) => m.kind)).toEqual([
      'system',
      'task',
      'history',
      'history',
      'plan',
      'state',
      'correction',
    ]);
    expect(build.messages[4].content).toBe('Planning hint:\nopen the cart');
    expect(build.messages[6].content).toBe(
      'Your previous reply was rejected. Fix these problems and answer again in the required JSON format:\n- action: Required',
    );
    expect(build.stateTruncation).toBe('none');
    expect(build.droppedHistoryGroups).toBe(0);
  });

  it('folds a step into an assistant reply and a result message', () => {
    const manager = new ContextBudgetManager('S', 'T', options(100_000));
    manager.addStep(output, [
      { isDone: false, extractedContent: 'Clicked', includeInMemory: true },
      { isDone: false, extractedContent: 'not kept', includeInMemory: false },
      { isDone: false, error: 'boom', includeInMemory: true },
    ]);
    const history = manager.build(input()).messages.filter((m) => m.kind === 'history');

    expect(history).toHaveLength(2);
    expect(history[0].role).toBe('assistant');
    expect(JSON.parse(String(history[0].content))).toEqual({
      current_state: { page_summary: '', evaluation_previous_goal: 'Success', memory: 'm', next_goal: 'click' },
      action: [{ click_element: { index: 1 } }],
    });
    expect(history[1]).toEqual({
      role: 'user',
      kind: 'history',
      content: 'Action result 1/3: Clicked\nAction error 3/3: boom',
    });
  });

  it('adds nothing for a step without output or results', () => {
    const manager = new ContextBudgetManager('S', 'T', options(100_000));
    manager.addStep(null, []);
    expect(manager.historyLength).toBe(0);
  });

  it('drops the oldest history groups first, for good', () => {
    const full = new ContextBudgetManager('S', 'T', options(100_000));
    for (const note of ['a', 'b', 'c']) full.addUserNote(note.repeat(100));
    const fullTokens = full.build(input()).estimatedTokens;

    const manager = new ContextBudgetManager('S', 'T', options(fullTokens - 150));
    for (const note of ['a', 'b', 'c']) manager.addUserNote(note.repeat(100));
    const build = manager.build(input());

    expect(build.droppedHistoryGroups).toBe(2);
    expect(build.estimatedTokens).toBe(fullTokens - 200);
    expect(build.messages.filter((m) => m.kind === 'history').map((m) => m.content)).toEqual(['c'.repeat(100)]);
    expect(manager.historyLength).toBe(1);
  });

  it('drops the screenshot once the history is gone', () => {
    const vision = options(100_000, { useVision: true });
    const withImage = new ContextBudgetManager('S', 'T', vision).build(input(undefined, 'AAAA'));
    const state = withImage.messages[2];
    expect(Array.isArray(state.content)).toBe(true);

    const manager = new ContextBudgetManager('S', 'T', { ...vision, maxInputTokens: withImage.estimatedTokens - 50 });
    const build = manager.build(input(undefined, 'AAAA'));

    expect(build.droppedScreenshot).toBe(true);
    expect(build.estimatedTokens).toBe(withImage.estimatedTokens - 100);
    expect(typeof build.messages[2].content).toBe('string');
    expect(build.stateTruncation).toBe('none');
  });

  it('drops non-interactive page text before cutting the element list', () => {
    const children = [button('/html/body/button', 'Go'), el('p', '/html/body/p', { children: [text('x'.repeat(300))] })];
    const fullTokens = new ContextBudgetManager('S', 'T', options(100_000)).build(input(children)).estimatedTokens;

    const build = new ContextBudgetManager('S', 'T', options(fullTokens - 10)).build(input(children));

    expect(build.stateTruncation).toBe('text_dropped');
    const state = String(build.messages[2].content);
    expect(state).toContain('[1]<button>Go</button>');
    expect(state).not.toContain('x'.repeat(10));
    expect(build.estimatedTokens).toBeLessThanOrEqual(fullTokens - 10);
  });

  it('cuts the state text as a last resort', () => {
    const stateInput = input();
    const build = new ContextBudgetManager('S', 'T', options(52)).build(stateInput);
    const expected = renderStateText(stateInput, { includeAttributes: ['type', 'value'], includeText: false }).slice(0, 50);

    expect(build.stateTruncation).toBe('hard_cut');
    expect(build.messages[2].content).toBe(expected);
    expect(build.estimatedTokens).toBe(52);
  });

  it('never builds a context above the ceiling', () => {
    const vision = options(0, { useVision: true });
    const unbounded = new ContextBudgetManager('S', 'T', { ...vision, maxInputTokens: 100_000 });
    unbounded.addUserNote('n'.repeat(40));
    const ceiling = unbounded.build(input(undefined, 'AAAA')).estimatedTokens;

    for (let budget = 3; budget <= ceiling + 10; budget += 7) {
      const manager = new ContextBudgetManager('S', 'T', { ...vision, maxInputTokens: budget });
      manager.addUserNote('n'.repeat(40));
      const build = manager.build(input(undefined, 'AAAA'), { plan: 'p'.repeat(20), corrections: ['fix it'] });
      expect(build.estimatedTokens).toBeLessThanOrEqual(budget);
      expect(build.messages.slice(0, 2).map((m) => m.content)).toEqual(['S', 'T']);
    }
  });

  it('rejects a budget that cannot hold the system and task messages', () => {
    expect(() => new ContextBudgetManager('s'.repeat(50), 'task', options(10))).toThrow(ConfigError);
  });

  it('masks secrets in every message', () => {
    const filter = new SensitiveDataFilter({ password: 'test-secret' });
    const manager = new ContextBudgetManager('S', 'log in with test-secret', options(100_000, { filter }));
    manager.addUserNote('User response: test-secret');
    const field = el('input', '/html/body/input', { attributes: { type: 'password', value: 'test-secret' } });

    const build = manager.build(input([field]));

    for (const message of build.messages) {
      expect(String(message.content)).not.toContain('test-secret');
    }
    expect(build.messages[1].content).toBe('log in with <secret>password</secret>');
    expect(String(build.messages[3].content)).toContain(
      '[1]<input type="password" value="<secret>password</secret>"></input>',
    );
  });
});
