import type {
  DOMElementNode,
  ElementLocator,
  ElementRef,
  NodeHandle,
  TabInfo,
} from '../types/dom.js';
import { ElementNotFoundError } from '../exception/errors.js';
import type { ElementTree, RenderOptions } from './element-tree.js';

export interface BrowserStateInit {
  captureId: string;
  url: string;
  title: string;
  tabs: TabInfo[];
  screenshot?: string;
  tree: ElementTree;
  selectorMap: ReadonlyMap<number, NodeHandle>;
  pixelsAbove: number;
  pixelsBelow: number;
  capturedAt: string;
}

/**
 * One immutable capture of the page. The selector map is a filtered index
 * over the tree's arena: highlight index -> node handle.
 */
export class BrowserState {
  readonly captureId: string;
  readonly url: string;
  readonly title: string;
  readonly tabs: readonly TabInfo[];
  /** Base64 PNG, when the capture asked for one. */
  readonly screenshot?: string;
  readonly tree: ElementTree;
  readonly selectorMap: ReadonlyMap<number, NodeHandle>;
  readonly pixelsAbove: number;
  readonly pixelsBelow: number;
  readonly capturedAt: string;

  constructor(init: BrowserStateInit) {
    this.captureId = init.captureId;
    this.url = init.url;
    this.title = init.title;
    this.tabs = Object.freeze([...init.tabs]);
    this.screenshot = init.screenshot;
    this.tree = init.tree;
    this.selectorMap = init.selectorMap;
    this.pixelsAbove = init.pixelsAbove;
    this.pixelsBelow = init.pixelsBelow;
    this.capturedAt = init.capturedAt;
    Object.freeze(this);
  }

  ref(index: number): ElementRef {
    return { captureId: this.captureId, index };
  }

  hasIndex(index: number): boolean {
    return this.selectorMap.has(index);
  }

  getElement(index: number): DOMElementNode | undefined {
    const handle = this.selectorMap.get(index);
    return handle === undefined ? undefined : this.tree.element(handle);
  }

  /**
   * Resolve a ref taken from some capture. Refs from any other capture are
   * stale, even when the index happens to exist here too.
   */
  resolve(ref: ElementRef): DOMElementNode {
    if (ref.captureId !== this.captureId) {
      throw new ElementNotFoundError(
        ref.index,
        `Element index ${ref.index} belongs to an earlier page state - the page has been captured again since`,
      );
    }
    const element = this.getElement(ref.index);
    if (!element) {
      throw new ElementNotFoundError(ref.index);
    }
    return element;
  }

  highlightIndices(): number[] {
    return [...this.selectorMap.keys()].sort((a, b) => a - b);
  }

  /** Frame chain + xpath of every highlighted element. */
  interactiveSignature(): Set<string> {
    const signature = new Set<string>();
    for (const handle of this.selectorMap.values()) {
      const element = this.tree.element(handle);
      if (element) signature.add(locatorKey(element));
    }
    return signature;
  }

  locatorOf(element: DOMElementNode): ElementLocator {
    return {
      index: element.highlightIndex ?? -1,
      tagName: element.tagName,
      xpath: element.xpath,
      frameChain: [...element.frameChain],
    };
  }

  /** Find the highlighted element matching a locator recorded from another capture. */
  findByLocator(locator: Pick<ElementLocator, 'xpath' | 'frameChain'>): DOMElementNode | undefined {
    const key = locatorKey(locator);
    for (const handle of this.selectorMap.values()) {
      const element = this.tree.element(handle);
      if (element && locatorKey(element) === key) return element;
    }
    return undefined;
  }

  render(options: RenderOptions): string {
    return this.tree.render(options);
  }
}

function locatorKey(locator: { xpath: string; frameChain: readonly string[] }): string {
  return [...locator.frameChain, locator.xpath].join(' >> ');
}
