import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { createDefaultRegistry } from '../../src/actions/default-registry.js';
import { FatalError, ValidationError } from '../../src/exception/errors.js';
import type { ActionResult } from '../../src/types/action-result.js';
import { button, el, FakeDriver, page } from '../helpers/fakes.js';

const form = page([
  el('input', '/html/body/input[1]', { attributes: { type: 'file' }, rect: { x: 10, y: 10, width: 100, height: 20 } }),
  el('select', '/html/body/select', { rect: { x: 10, y: 40, width: 100, height: 20 } }),
  button('/html/body/button', 'Save', 70),
  el('input', '/html/body/input[2]', { attributes: { type: 'text' }, rect: { x: 10, y: 100, width: 100, height: 20 } }),
]);

describe('built-in actions', () => {
  const registry = createDefaultRegistry();
  let driver: FakeDriver;

  beforeEach(() => {
    driver = new FakeDriver(form);
  });

  async function run(name: string, params: unknown, target?: number): Promise<ActionResult> {
    const state = await driver.captureState({ screenshot: false });
    const parsed = registry.parse({ name, params });
    return parsed.run({ driver, state, target: target === undefined ? undefined : state.getElement(target) });
  }

  describe('element actions', () => {
    it('clicks the resolved element and describes it', async () => {
      const result = await run('click_element', { index: 3 }, 3);
      expect(driver.commands).toHaveLength(1);
      expect(driver.commands[0].type).toBe('click');
      expect(result).toEqual({ isDone: false, extractedContent: 'Clicked element 3: <button> "Save"', includeInMemory: true });
    });

    it('mentions a tab opened by the click', async () => {
      driver.respond('click', { newTabOpened: true });
      const result = await run('click_element', { index: 3 }, 3);
      expect(result.extractedContent).toBe('Clicked element 3: <button> "Save" - a new tab was opened');
    });

    it('refuses to click a file input', async () => {
      const result = await run('click_element', { index: 1 }, 1);
      expect(driver.commands).toEqual([]);
      expect(result).toEqual({
        isDone: false,
        error: 'Element 1 opens a file upload dialog, which cannot be handled by clicking',
        errorKind: 'action_failed',
        includeInMemory: true,
      });
    });

    it('types text without echoing it back', async () => {
      const result = await run('input_text', { index: 4, text: 'hello' }, 4);
      const command = driver.commands[0];
      expect(command.type === 'input_text' && command.text).toBe('hello');
      expect(result.extractedContent).toBe('Typed text into element 4');
    });

    it('lists dropdown options', async () => {
      driver.respond('get_dropdown_options', { options: ['S', 'M'] });
      const result = await run('get_dropdown_options', { index: 2 }, 2);
      expect(result.extractedContent).toBe(
        'Options of dropdown 2:\n0: text="S"\n1: text="M"\nUse the exact text in select_dropdown_option',
      );
    });

    it('reports an empty dropdown', async () => {
      const result = await run('get_dropdown_options', { index: 2 }, 2);
      expect(result.extractedContent).toBe('Dropdown 2 has no options');
    });

    it('refuses dropdown actions on anything but a select', async () => {
      expect((await run('get_dropdown_options', { index: 3 }, 3)).error).toBe(
        'Element 3 is a <button>, not a <select>; click it instead',
      );
      expect((await run('select_dropdown_option', { index: 3, text: 'M' }, 3)).error).toBe(
        'Element 3 is a <button>, not a <select>',
      );
      expect(driver.commands).toEqual([]);
    });

    it('selects an option by its text', async () => {
      const result = await run('select_dropdown_option', { index: 2, text: 'M' }, 2);
      const command = driver.commands[0];
      expect(command.type === 'select_option' && command.text).toBe('M');
      expect(result.extractedContent).toBe('Selected option "M" in dropdown 2');
    });

    it('needs the dispatcher to resolve the target', async () => {
      await expect(run('click_element', { index: 3 })).rejects.toThrow(FatalError);
    });
  });

  describe('navigation actions', () => {
    it('searches Google', async () => {
      const result = await run('search_google', { query: 'red shoes' });
      expect(driver.commands).toEqual([{ type: 'navigate', url: 'https://www.google.com/search?q=red%20shoes&udm=14' }]);
      expect(result.extractedContent).toBe('Searched for "red shoes" in Google');
    });

    it('navigates, goes back and switches tabs', async () => {
      await run('go_to_url', { url: 'https://example.test/cart' });
      await run('go_back', {});
      await run('switch_tab', { page_id: 1 });
      await run('open_tab', { url: 'https://example.test/help' });
      expect(driver.commands).toEqual([
        { type: 'navigate', url: 'https://example.test/cart' },
        { type: 'go_back' },
        { type: 'switch_tab', pageId: 1 },
        { type: 'open_tab', url: 'https://example.test/help' },
      ]);
    });

    it('waits three seconds by default and at most a minute', async () => {
      const result = await run('wait', {});
      expect(driver.commands).toEqual([{ type: 'wait', ms: 3000 }]);
      expect(result.extractedContent).toBe('Waited for 3 seconds');
      await expect(run('wait', { seconds: 61 })).rejects.toThrow(ValidationError);
    });
  });

  describe('page actions', () => {
    it('extracts the page text for a goal', async () => {
      driver.respond('read_page', { content: 'Total: 42' });
      const result = await run('extract_content', { goal: 'the total' });
      expect(result.extractedContent).toBe('Page content for "the total":\nTotal: 42');
    });

    it('scrolls by a page or by pixels', async () => {
      expect((await run('scroll_down', {})).extractedContent).toBe('Scrolled down the page by one page');
      expect((await run('scroll_up', { amount: 200 })).extractedContent).toBe('Scrolled up the page by 200 pixels');
      expect(driver.commands).toEqual([
        { type: 'scroll', direction: 'down', amount: undefined },
        { type: 'scroll', direction: 'up', amount: 200 },
      ]);
    });

    it('reports text it could not scroll to', async () => {
      driver.respond('scroll_to_text', { found: false });
      expect((await run('scroll_to_text', { text: 'Total' })).extractedContent).toBe(
        'Text "Total" not found or not visible on page',
      );
    });

    it('sends keys', async () => {
      expect((await run('send_keys', { keys: 'Escape' })).extractedContent).toBe('Sent keys: Escape');
    });
  });

  describe('control actions', () => {
    it('finishes with free text', async () => {
      expect(await run('done', { text: '42 items' })).toEqual({
        isDone: true,
        extractedContent: '42 items',
        includeInMemory: true,
      });
    });

    it('asks the user for help', async () => {
      const result = await run('request_user_help', { message: 'Solve the CAPTCHA' });
      expect(result.extractedContent).toBe('Waiting for the user: Solve the CAPTCHA');
      expect(result.userAction).toEqual({ type: 'help', message: 'Solve the CAPTCHA' });
    });

    it('asks the user a question with options', async () => {
      const result = await run('ask_user_question', { question: 'Which size?', options: ['S', 'M'] });
      expect(result.userAction).toEqual({ type: 'question', message: 'Which size?', options: ['S', 'M'] });
    });
  });
});

describe('done with an output schema', () => {
  const registry = createDefaultRegistry({ outputSchema: z.object({ price: z.number(), currency: z.string() }) });

  it('returns the validated record as JSON', async () => {
    const driver = new FakeDriver(page([]));
    const state = await driver.captureState({ screenshot: false });
    const result = await registry.parse({ name: 'done', params: { price: 9.5, currency: 'EUR' } }).run({ driver, state });
    expect(result.isDone).toBe(true);
    expect(result.extractedContent).toBe('{"price":9.5,"currency":"EUR"}');
  });

  it('rejects free text', () => {
    expect(() => registry.parse({ name: 'done', params: { text: 'done' } })).toThrow(ValidationError);
  });

  it('describes the record fields to the reasoner', () => {
    expect(registry.get('done')?.signature).toBe('done: {price: number, currency: string}');
  });
});
