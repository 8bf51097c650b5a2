import { z } from 'zod';
import { defineAction } from '../registry.js';
import { succeeded } from './results.js';

export const searchGoogleAction = defineAction({
  name: 'search_google',
  description: 'Search the query in Google in the current tab. Use concrete queries, as a person would type them.',
  schema: z.object({ query: z.string().min(1) }),
  async handler({ query }, { driver }) {
    await driver.execute({ type: 'navigate', url: googleSearchUrl(query) });
    return succeeded(`Searched for "${query}" in Google`);
  },
});

export const goToUrlAction = defineAction({
  name: 'go_to_url',
  description: 'Navigate to a URL in the current tab',
  schema: z.object({ url: z.string().min(1) }),
  async handler({ url }, { driver }) {
    await driver.execute({ type: 'navigate', url });
    return succeeded(`Navigated to ${url}`);
  },
});

export const goBackAction = defineAction({
  name: 'go_back',
  description: 'Go back to the previous page',
  schema: z.object({}),
  async handler(_params, { driver }) {
    await driver.execute({ type: 'go_back' });
    return succeeded('Navigated back');
  },
});

export const waitAction = defineAction({
  name: 'wait',
  description: 'Wait for the page to settle, e.g. while content is loading',
  schema: z.object({ seconds: z.number().min(0).max(60).default(3) }),
  async handler({ seconds }, { driver }) {
    await driver.execute({ type: 'wait', ms: Math.round(seconds * 1000) });
    return succeeded(`Waited for ${seconds} seconds`);
  },
});

export const switchTabAction = defineAction({
  name: 'switch_tab',
  description: 'Switch to the tab with the given page_id',
  schema: z.object({ page_id: z.number().int().nonnegative() }),
  async handler({ page_id }, { driver }) {
    await driver.execute({ type: 'switch_tab', pageId: page_id });
    return succeeded(`Switched to tab ${page_id}`);
  },
});

export const openTabAction = defineAction({
  name: 'open_tab',
  description: 'Open a URL in a new tab',
  schema: z.object({ url: z.string().min(1) }),
  async handler({ url }, { driver }) {
    await driver.execute({ type: 'open_tab', url });
    return succeeded(`Opened new tab with ${url}`);
  },
});

export function googleSearchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}&udm=14`;
}
