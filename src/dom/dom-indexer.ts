import { randomUUID } from 'node:crypto';
import type {
  BoundingBox,
  DOMElementNode,
  DOMNode,
  DOMTextNode,
  NodeHandle,
  ViewportInfo,
} from '../types/dom.js';
import type { RawElementNode, RawNode, RawPageSnapshot } from '../types/raw-snapshot.js';
import { ElementTree, collapseWhitespace } from './element-tree.js';
import { BrowserState } from './browser-state.js';
import {
  boxKey,
  hasArea,
  isElementInteractive,
  isElementVisible,
  isInExpandedViewport,
} from './heuristics.js';

export interface DomIndexerOptions {
  /** Pixels above/below the viewport still eligible for a highlight index; -1 = whole page. */
  viewportExpansion: number;
  /** First highlight index handed out in a capture. */
  firstIndex?: number;
}

interface Offset {
  dx: number;
  dy: number;
}

type Draft<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Turns a raw page snapshot into a BrowserState: an arena-backed element tree
 * plus a selector map of the visible, interactive elements. Every capture is
 * a full rebuild; cost is linear in node count (times tree depth for the
 * duplicate-box collapse).
 */
export class DomIndexer {
  private readonly viewportExpansion: number;
  private readonly firstIndex: number;

  constructor(options: DomIndexerOptions) {
    this.viewportExpansion = options.viewportExpansion;
    this.firstIndex = options.firstIndex ?? 1;
  }

  index(snapshot: RawPageSnapshot): BrowserState {
    const captureId = randomUUID();
    const builder = new TreeBuilder(captureId, snapshot.viewport, this.viewportExpansion);
    const root = builder.addElement(snapshot.root, null, [], { dx: 0, dy: 0 });

    const selectorMap = new Map<number, NodeHandle>();
    let next = this.firstIndex;
    for (const handle of builder.highlightable()) {
      builder.assignIndex(handle, next);
      selectorMap.set(next, handle);
      next++;
    }

    const viewport = snapshot.viewport;
    return new BrowserState({
      captureId,
      url: snapshot.url,
      title: snapshot.title,
      tabs: snapshot.tabs ?? [],
      screenshot: snapshot.screenshot,
      tree: builder.finish(root),
      selectorMap,
      pixelsAbove: Math.max(0, Math.round(viewport.scrollY)),
      pixelsBelow: Math.max(0, Math.round(viewport.pageHeight - (viewport.scrollY + viewport.height))),
      capturedAt: new Date().toISOString(),
    });
  }
}

class TreeBuilder {
  private readonly nodes: Draft<DOMNode>[] = [];
  private readonly elements = new Map<NodeHandle, Draft<DOMElementNode>>();
  /** Visible, interactive, in-viewport, uncovered elements in traversal order. */
  private readonly candidates: NodeHandle[] = [];

  constructor(
    private readonly captureId: string,
    private readonly viewport: ViewportInfo,
    private readonly viewportExpansion: number,
  ) {}

  addElement(
    raw: RawElementNode,
    parent: NodeHandle | null,
    frameChain: string[],
    offset: Offset,
  ): NodeHandle {
    const handle = this.nodes.length;
    const box = raw.rect
      ? { x: raw.rect.x + offset.dx, y: raw.rect.y + offset.dy, width: raw.rect.width, height: raw.rect.height }
      : null;
    const isVisible = isElementVisible(raw, box);
    const isInteractive = isElementInteractive(raw);
    const isInViewport = hasArea(box) && isInExpandedViewport(box, this.viewport, this.viewportExpansion);
    const children: NodeHandle[] = [];

    const element: Draft<DOMElementNode> = {
      type: 'element',
      handle,
      parent,
      children,
      tagName: raw.tagName.toLowerCase(),
      attributes: { ...raw.attributes },
      xpath: raw.xpath,
      frameChain: [...frameChain],
      boundingBox: box,
      viewportCoordinates: box ? this.toViewport(box) : null,
      isVisible,
      isInteractive,
      isInViewport,
      highlightIndex: null,
      captureId: this.captureId,
    };
    this.nodes.push(element);
    this.elements.set(handle, element);

    if (isVisible && isInteractive && isInViewport && raw.isTopElement !== false) {
      this.candidates.push(handle);
    }

    for (const child of raw.children) {
      const childHandle = this.addNode(child, handle, isVisible, frameChain, offset);
      if (childHandle !== null) children.push(childHandle);
    }

    // Frame content lives in the iframe's own document coordinates.
    if (raw.frame && box) {
      const frameOffset = { dx: box.x - raw.frame.scrollX, dy: box.y - raw.frame.scrollY };
      children.push(this.addElement(raw.frame.root, handle, [...frameChain, raw.xpath], frameOffset));
    }

    return handle;
  }

  private addNode(
    raw: RawNode,
    parent: NodeHandle,
    parentVisible: boolean,
    frameChain: string[],
    offset: Offset,
  ): NodeHandle | null {
    if (raw.type === 'element') {
      return this.addElement(raw, parent, frameChain, offset);
    }
    const text = collapseWhitespace(raw.text);
    if (text === '') return null;

    const handle = this.nodes.length;
    const node: Draft<DOMTextNode> = { type: 'text', handle, parent, text, isVisible: parentVisible };
    this.nodes.push(node);
    return handle;
  }

  /**
   * Candidates minus ancestors that share their exact box with a deeper
   * candidate: the most specific element keeps the index.
   */
  highlightable(): NodeHandle[] {
    const candidateSet = new Set(this.candidates);
    const collapsed = new Set<NodeHandle>();

    for (const handle of this.candidates) {
      const element = this.elements.get(handle);
      if (!element?.boundingBox) continue;
      const key = boxKey(element.boundingBox);

      let parent = element.parent;
      while (parent !== null) {
        const ancestor = this.elements.get(parent);
        if (!ancestor) break;
        if (candidateSet.has(parent) && ancestor.boundingBox && boxKey(ancestor.boundingBox) === key) {
          collapsed.add(parent);
        }
        parent = ancestor.parent;
      }
    }

    return this.candidates.filter((handle) => !collapsed.has(handle));
  }

  assignIndex(handle: NodeHandle, index: number): void {
    const element = this.elements.get(handle);
    if (element) element.highlightIndex = index;
  }

  finish(root: NodeHandle): ElementTree {
    for (const node of this.nodes) {
      if (node.type === 'element') {
        Object.freeze(node.children);
        Object.freeze(node.frameChain);
        Object.freeze(node.attributes);
      }
      Object.freeze(node);
    }
    return new ElementTree(Object.freeze([...this.nodes]), root);
  }

  private toViewport(box: BoundingBox): BoundingBox {
    return {
      x: box.x - this.viewport.scrollX,
      y: box.y - this.viewport.scrollY,
      width: box.width,
      height: box.height,
    };
  }
}
