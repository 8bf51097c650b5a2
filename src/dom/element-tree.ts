import type { DOMElementNode, DOMNode, NodeHandle } from '../types/dom.js';

export interface RenderOptions {
  /** Attribute names rendered inside the tag, in this order. */
  includeAttributes: readonly string[];
  /** Whether visible text outside highlighted elements is rendered as `[]text` lines. */
  includeText: boolean;
}

/**
 * Arena of DOM nodes addressed by integer handles. The tree shape is the
 * parent/children handle links; nothing holds object references into it.
 */
export class ElementTree {
  constructor(
    private readonly nodes: readonly DOMNode[],
    readonly root: NodeHandle,
  ) {}

  get size(): number {
    return this.nodes.length;
  }

  node(handle: NodeHandle): DOMNode {
    const node = this.nodes[handle];
    if (!node) {
      throw new RangeError(`No node with handle ${handle}`);
    }
    return node;
  }

  element(handle: NodeHandle): DOMElementNode | undefined {
    const node = this.nodes[handle];
    return node?.type === 'element' ? node : undefined;
  }

  children(handle: NodeHandle): DOMNode[] {
    const node = this.node(handle);
    return node.type === 'element' ? node.children.map((child) => this.node(child)) : [];
  }

  /** Pre-order traversal from `from` (the root by default). */
  *walk(from: NodeHandle = this.root): Generator<DOMNode> {
    const stack: NodeHandle[] = [from];
    while (stack.length > 0) {
      const handle = stack.pop();
      if (handle === undefined) break;
      const node = this.node(handle);
      yield node;
      if (node.type === 'element') {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }
  }

  *ancestors(handle: NodeHandle): Generator<DOMElementNode> {
    let parent = this.node(handle).parent;
    while (parent !== null) {
      const element = this.element(parent);
      if (!element) return;
      yield element;
      parent = element.parent;
    }
  }

  hasHighlightedAncestor(handle: NodeHandle): boolean {
    for (const ancestor of this.ancestors(handle)) {
      if (ancestor.highlightIndex !== null) return true;
    }
    return false;
  }

  /**
   * Text of `handle`'s subtree, stopping at descendants that carry their own
   * highlight index.
   */
  textUntilNextClickable(handle: NodeHandle): string {
    const parts: string[] = [];
    const visit = (current: NodeHandle): void => {
      const node = this.node(current);
      if (node.type === 'text') {
        parts.push(node.text);
        return;
      }
      if (current !== handle && node.highlightIndex !== null) return;
      for (const child of node.children) visit(child);
    };
    visit(handle);
    return collapseWhitespace(parts.join(' '));
  }

  /**
   * Text representation handed to the reasoner:
   *
   *   [3]<button aria-label="Search">Go</button>
   *   []Some visible paragraph text
   */
  render(options: RenderOptions): string {
    const lines: string[] = [];
    for (const node of this.walk()) {
      if (node.type === 'element') {
        if (node.highlightIndex === null) continue;
        const attrs = renderAttributes(node, options.includeAttributes);
        const text = this.textUntilNextClickable(node.handle);
        lines.push(`[${node.highlightIndex}]<${node.tagName}${attrs}>${text}</${node.tagName}>`);
      } else if (options.includeText && node.isVisible && !this.hasHighlightedAncestor(node.handle)) {
        lines.push(`[]${node.text}`);
      }
    }
    return lines.join('\n');
  }
}

function renderAttributes(node: DOMElementNode, include: readonly string[]): string {
  let out = '';
  for (const name of include) {
    const value = node.attributes[name];
    if (value === undefined || value === '') continue;
    out += ` ${name}="${collapseWhitespace(value)}"`;
  }
  return out;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
