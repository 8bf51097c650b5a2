import { z } from 'zod';
import { defineAction } from '../registry.js';
import { succeeded } from './results.js';

const amount = z.number().int().positive().optional();

export const extractContentAction = defineAction({
  name: 'extract_content',
  description: 'Read the text of the whole page to collect information for the given goal',
  schema: z.object({ goal: z.string().min(1) }),
  async handler({ goal }, { driver }) {
    const outcome = await driver.execute({ type: 'read_page' });
    return succeeded(`Page content for "${goal}":\n${outcome.content ?? ''}`);
  },
});

export const scrollDownAction = defineAction({
  name: 'scroll_down',
  description: 'Scroll down by the given pixels, or by one page when amount is omitted',
  schema: z.object({ amount }),
  async handler({ amount }, { driver }) {
    await driver.execute({ type: 'scroll', direction: 'down', amount });
    return succeeded(`Scrolled down the page by ${amount === undefined ? 'one page' : `${amount} pixels`}`);
  },
});

export const scrollUpAction = defineAction({
  name: 'scroll_up',
  description: 'Scroll up by the given pixels, or by one page when amount is omitted',
  schema: z.object({ amount }),
  async handler({ amount }, { driver }) {
    await driver.execute({ type: 'scroll', direction: 'up', amount });
    return succeeded(`Scrolled up the page by ${amount === undefined ? 'one page' : `${amount} pixels`}`);
  },
});

export const sendKeysAction = defineAction({
  name: 'send_keys',
  description: 'Send special keys or shortcuts such as "Escape", "Enter" or "Control+a"',
  schema: z.object({ keys: z.string().min(1) }),
  async handler({ keys }, { driver }) {
    await driver.execute({ type: 'send_keys', keys });
    return succeeded(`Sent keys: ${keys}`);
  },
});

export const scrollToTextAction = defineAction({
  name: 'scroll_to_text',
  description: 'Scroll to the first visible occurrence of the given text',
  schema: z.object({ text: z.string().min(1) }),
  async handler({ text }, { driver }) {
    const outcome = await driver.execute({ type: 'scroll_to_text', text });
    return succeeded(outcome.found ? `Scrolled to text: ${text}` : `Text "${text}" not found or not visible on page`);
  },
});
