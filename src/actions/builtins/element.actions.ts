import { z } from 'zod';
import { defineAction } from '../registry.js';
import { describeElement, refused, succeeded, targetOf } from './results.js';

const index = z.number().int().nonnegative();

export const clickElementAction = defineAction({
  name: 'click_element',
  description: 'Click the element with the given index',
  schema: z.object({ index }),
  async handler({ index }, ctx) {
    const target = targetOf(ctx, 'click_element');
    if (target.tagName === 'input' && target.attributes.type?.toLowerCase() === 'file') {
      return refused(`Element ${index} opens a file upload dialog, which cannot be handled by clicking`);
    }
    const outcome = await ctx.driver.execute({ type: 'click', target });
    const clicked = `Clicked element ${index}: ${describeElement(ctx, target)}`;
    return succeeded(outcome.newTabOpened ? `${clicked} - a new tab was opened` : clicked);
  },
});

export const inputTextAction = defineAction({
  name: 'input_text',
  description: 'Type text into the input element with the given index, replacing its value',
  schema: z.object({ index, text: z.string() }),
  async handler({ index, text }, ctx) {
    const target = targetOf(ctx, 'input_text');
    await ctx.driver.execute({ type: 'input_text', target, text });
    // The typed text may be a revealed secret; it is not echoed back.
    return succeeded(`Typed text into element ${index}`);
  },
});

export const getDropdownOptionsAction = defineAction({
  name: 'get_dropdown_options',
  description: 'List the options of the <select> element with the given index',
  schema: z.object({ index }),
  async handler({ index }, ctx) {
    const target = targetOf(ctx, 'get_dropdown_options');
    if (target.tagName !== 'select') {
      return refused(`Element ${index} is a <${target.tagName}>, not a <select>; click it instead`);
    }
    const outcome = await ctx.driver.execute({ type: 'get_dropdown_options', target });
    const options = outcome.options ?? [];
    if (options.length === 0) {
      return succeeded(`Dropdown ${index} has no options`);
    }
    const lines = options.map((option, i) => `${i}: text=${JSON.stringify(option)}`);
    return succeeded(
      `Options of dropdown ${index}:\n${lines.join('\n')}\nUse the exact text in select_dropdown_option`,
    );
  },
});

export const selectDropdownOptionAction = defineAction({
  name: 'select_dropdown_option',
  description: 'Select the option with the given text in the <select> element with the given index',
  schema: z.object({ index, text: z.string().min(1) }),
  async handler({ index, text }, ctx) {
    const target = targetOf(ctx, 'select_dropdown_option');
    if (target.tagName !== 'select') {
      return refused(`Element ${index} is a <${target.tagName}>, not a <select>`);
    }
    await ctx.driver.execute({ type: 'select_option', target, text });
    return succeeded(`Selected option "${text}" in dropdown ${index}`);
  },
});
