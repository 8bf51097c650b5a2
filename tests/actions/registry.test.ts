import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ActionRegistry, defineAction } from '../../src/actions/registry.js';
import { createDefaultRegistry } from '../../src/actions/default-registry.js';
import { ConfigError, ValidationError } from '../../src/exception/errors.js';
import { FakeDriver, page } from '../helpers/fakes.js';

const echo = defineAction({
  name: 'echo',
  description: 'Repeat a word',
  schema: z.object({ word: z.string(), times: z.number().int().default(1), loud: z.boolean().optional() }),
  async handler({ word, times }) {
    return { isDone: false, extractedContent: word.repeat(times), includeInMemory: true };
  },
});

describe('defineAction', () => {
  it('derives a signature from the schema', () => {
    expect(echo.signature).toBe('echo: {word: string, times?: integer, loud?: boolean}');
  });

  it('parses parameters once and hands the typed record to the handler', async () => {
    const parsed = echo.parse({ word: 'ab', times: 2 });
    expect(parsed.params).toEqual({ word: 'ab', times: 2 });
    expect(parsed.index).toBeUndefined();
    const driver = new FakeDriver(page([]));
    const result = await parsed.run({ driver, state: await driver.captureState({ screenshot: false }) });
    expect(result.extractedContent).toBe('abab');
  });

  it('reports malformed parameters as a ValidationError', () => {
    expect(() => echo.parse({ times: 'x' })).toThrow(ValidationError);
    try {
      echo.parse({ times: 'x' });
    } catch (error) {
      expect(error instanceof ValidationError && error.issues).toEqual([
        'word: Required',
        'times: Expected number, received string',
      ]);
    }
  });

  it('treats missing parameters as an empty record', () => {
    const noParams = defineAction({
      name: 'noop',
      description: 'Nothing',
      schema: z.object({}),
      async handler() {
        return { isDone: false, includeInMemory: false };
      },
    });
    expect(noParams.parse(null).params).toEqual({});
    expect(noParams.signature).toBe('noop: {}');
  });

  it('exposes the targeted index', () => {
    const registry = createDefaultRegistry();
    expect(registry.parse({ name: 'click_element', params: { index: 4 } }).index).toBe(4);
  });
});

describe('ActionRegistry', () => {
  it('rejects a second action with the same name', () => {
    const registry = new ActionRegistry();
    registry.register(echo);
    expect(() => registry.register(echo)).toThrow(ConfigError);
    expect(() => registry.register(echo)).toThrow('Action "echo" is already registered');
  });

  it('rejects unknown actions and lists the known ones', () => {
    const registry = new ActionRegistry();
    registry.register(echo);
    expect(() => registry.parse({ name: 'fly', params: {} })).toThrow('Unknown action "fly". Available actions: echo');
  });

  it('describes each action on its own line', () => {
    const registry = new ActionRegistry();
    registry.register(echo);
    expect(registry.describe()).toBe('- echo: {word: string, times?: integer, loud?: boolean} - Repeat a word');
  });
});

describe('createDefaultRegistry', () => {
  it('registers the built-in actions', () => {
    expect(createDefaultRegistry().names()).toEqual([
      'done',
      'search_google',
      'go_to_url',
      'go_back',
      'wait',
      'click_element',
      'input_text',
      'switch_tab',
      'open_tab',
      'extract_content',
      'scroll_down',
      'scroll_up',
      'send_keys',
      'scroll_to_text',
      'get_dropdown_options',
      'select_dropdown_option',
      'request_user_help',
      'ask_user_question',
    ]);
  });

  it('leaves out excluded actions', () => {
    const registry = createDefaultRegistry({ excludeActions: ['search_google', 'open_tab', 'not_an_action'] });
    expect(registry.has('search_google')).toBe(false);
    expect(registry.has('open_tab')).toBe(false);
    expect(registry.names()).toHaveLength(16);
  });

  it('accepts custom actions next to the built-in ones', () => {
    const registry = createDefaultRegistry();
    registry.register(echo);
    expect(registry.get('echo')?.description).toBe('Repeat a word');
  });
});
