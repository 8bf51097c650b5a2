import { errors, type BrowserContext, type FrameLocator, type Locator, type Page } from 'playwright';
import type { DOMElementNode, TabInfo } from '../types/dom.js';
import type { BrowserState } from '../dom/browser-state.js';
import { DomIndexer } from '../dom/dom-indexer.js';
import { RawPageSnapshotSchema } from '../schemas/raw-snapshot.schema.js';
import { errorMessage, NavigationError, ValidationError } from '../exception/errors.js';
import type { BrowserDriver, CaptureOptions, DriverCommand, DriverOutcome } from './browser-driver.js';
import { snapshotPage } from './page-snapshot.js';

export interface PlaywrightDriverOptions {
  viewportExpansion: number;
  /** Timeout for a single Playwright operation. */
  operationTimeoutMs?: number;
  navigationTimeoutMs?: number;
}

/**
 * BrowserDriver over a Playwright BrowserContext. Tabs are the context's
 * pages; page_id is a page's position in `context.pages()`.
 */
export class PlaywrightDriver implements BrowserDriver {
  private readonly context: BrowserContext;
  private readonly indexer: DomIndexer;
  private readonly operationTimeoutMs: number;
  private readonly navigationTimeoutMs: number;

  constructor(
    private page: Page,
    options: PlaywrightDriverOptions,
  ) {
    this.context = page.context();
    this.indexer = new DomIndexer({ viewportExpansion: options.viewportExpansion });
    this.operationTimeoutMs = options.operationTimeoutMs ?? 10_000;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
  }

  get activePage(): Page {
    return this.page;
  }

  async captureState(options: CaptureOptions): Promise<BrowserState> {
    return this.guard('capture', async () => {
      await this.page.waitForLoadState('domcontentloaded', { timeout: this.navigationTimeoutMs });
      const raw = await this.page.evaluate(snapshotPage);
      const tabs = await this.tabs();
      const screenshot = options.screenshot
        ? (await this.page.screenshot({ type: 'png', timeout: this.operationTimeoutMs })).toString('base64')
        : undefined;

      const parsed = RawPageSnapshotSchema.safeParse({ ...raw, tabs, screenshot });
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError(`Page snapshot failed validation: ${issues.slice(0, 5).join('; ')}`, issues);
      }
      return this.indexer.index(parsed.data);
    });
  }

  async execute(command: DriverCommand): Promise<DriverOutcome> {
    return this.guard(command.type, () => this.run(command));
  }

  private async run(command: DriverCommand): Promise<DriverOutcome> {
    const page = this.page;
    switch (command.type) {
      case 'navigate':
        await page.goto(command.url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
        return { detail: `Navigated to ${page.url()}` };

      case 'go_back':
        await page.goBack({ waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
        return { detail: `Back at ${page.url()}` };

      case 'wait':
        await page.waitForTimeout(command.ms);
        return {};

      case 'click': {
        const pagesBefore = this.context.pages().length;
        await this.locate(command.target).click({ timeout: this.operationTimeoutMs });
        const pages = this.context.pages();
        if (pages.length > pagesBefore) {
          this.page = pages[pages.length - 1];
          await this.page.bringToFront();
          return { newTabOpened: true };
        }
        return {};
      }

      case 'input_text':
        await this.locate(command.target).fill(command.text, { timeout: this.operationTimeoutMs });
        return {};

      case 'switch_tab': {
        const target = this.context.pages()[command.pageId];
        if (!target) {
          throw new ValidationError(`No tab with page_id ${command.pageId}`, [`page_id: no such tab`]);
        }
        this.page = target;
        await target.bringToFront();
        await target.waitForLoadState('domcontentloaded', { timeout: this.navigationTimeoutMs });
        return { detail: `Switched to ${target.url()}` };
      }

      case 'open_tab': {
        const opened = await this.context.newPage();
        this.page = opened;
        await opened.goto(command.url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
        return { newTabOpened: true };
      }

      case 'read_page': {
        const content = await page.evaluate(() => document.body?.innerText ?? '');
        return { content };
      }

      case 'scroll': {
        const sign = command.direction === 'down' ? 1 : -1;
        await page.evaluate(
          ({ sign, amount }) => window.scrollBy(0, sign * (amount ?? window.innerHeight)),
          { sign, amount: command.amount ?? null },
        );
        return {};
      }

      case 'send_keys':
        await page.keyboard.press(command.keys);
        return {};

      case 'scroll_to_text': {
        const match = page.getByText(command.text, { exact: false }).first();
        if ((await match.count()) === 0 || !(await match.isVisible())) {
          return { found: false };
        }
        await match.scrollIntoViewIfNeeded({ timeout: this.operationTimeoutMs });
        return { found: true };
      }

      case 'get_dropdown_options': {
        const options = await this.locate(command.target).evaluate((el) =>
          el instanceof HTMLSelectElement ? Array.from(el.options).map((option) => option.text.trim()) : [],
        );
        return { options };
      }

      case 'select_option':
        await this.locate(command.target).selectOption({ label: command.text }, { timeout: this.operationTimeoutMs });
        return {};

      default: {
        const _exhaustive: never = command;
        throw new ValidationError(`Unsupported driver command ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  /** Locator through the element's frame chain, outermost frame first. */
  private locate(target: DOMElementNode): Locator {
    let scope: Page | FrameLocator = this.page;
    for (const frameXpath of target.frameChain) {
      scope = scope.frameLocator(`xpath=${frameXpath}`);
    }
    return scope.locator(`xpath=${target.xpath}`);
  }

  private async tabs(): Promise<TabInfo[]> {
    return Promise.all(
      this.context.pages().map(async (page, pageId) => ({
        pageId,
        url: page.url(),
        title: await page.title(),
      })),
    );
  }

  /** Playwright timeouts and lost pages become NavigationErrors; other errors pass through. */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationError(`${operation}: ${error.message}`, 'timeout', { cause: error });
      }
      const message = errorMessage(error);
      if (/has been closed|target closed|browser has disconnected/i.test(message)) {
        throw new NavigationError(`${operation}: ${message}`, 'transport', { cause: error });
      }
      if (/net::err_|navigation failed|frame was detached/i.test(message)) {
        throw new NavigationError(`${operation}: ${message}`, 'navigation', { cause: error });
      }
      throw error;
    }
  }
}
