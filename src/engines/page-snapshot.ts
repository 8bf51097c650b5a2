import type { RawElementNode, RawNode, RawPageSnapshot } from '../types/raw-snapshot.js';

export type PageSnapshot = Omit<RawPageSnapshot, 'tabs' | 'screenshot'>;

/**
 * Runs inside the page (via page.evaluate) and must stay self-contained:
 * no imports, no references to module scope. Walks the DOM including
 * same-origin frames and records geometry, computed style, xpath and
 * whether each element is the topmost one at its centre.
 */
export function snapshotPage(): PageSnapshot {
  const SKIPPED_TAGS = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT', 'TEMPLATE', 'HEAD', 'META', 'LINK']);
  const OPAQUE_TAGS = new Set(['SVG', 'CANVAS', 'VIDEO', 'AUDIO']);

  const isElement = (node: Node): node is Element => node.nodeType === Node.ELEMENT_NODE;

  const isFrame = (el: Element): el is HTMLIFrameElement | HTMLFrameElement =>
    el.tagName === 'IFRAME' || el.tagName === 'FRAME';

  const xpathOf = (el: Element): string => {
    const parts: string[] = [];
    let node: Element | null = el;
    while (node) {
      const tag = node.tagName.toLowerCase();
      let position = 1;
      let sameTagSiblings = 0;
      const parent: Element | null = node.parentElement;
      if (parent) {
        for (const sibling of Array.from(parent.children)) {
          if (sibling.tagName !== node.tagName) continue;
          sameTagSiblings++;
          if (sibling === node) position = sameTagSiblings;
        }
      }
      parts.unshift(sameTagSiblings > 1 ? `${tag}[${position}]` : tag);
      node = parent;
    }
    return `/${parts.join('/')}`;
  };

  const walk = (el: Element, win: Window): RawElementNode => {
    const client = el.getBoundingClientRect();
    const rect = {
      x: client.left + win.scrollX,
      y: client.top + win.scrollY,
      width: client.width,
      height: client.height,
    };
    const computed = win.getComputedStyle(el);

    const attributes: Record<string, string> = {};
    for (const attr of Array.from(el.attributes)) {
      attributes[attr.name] = attr.value;
    }

    let isTopElement: boolean | undefined;
    const cx = client.left + client.width / 2;
    const cy = client.top + client.height / 2;
    if (client.width > 0 && client.height > 0 && cx >= 0 && cy >= 0 && cx < win.innerWidth && cy < win.innerHeight) {
      const hit = el.ownerDocument.elementFromPoint(cx, cy);
      isTopElement = hit === null || hit === el || el.contains(hit);
    }

    const children: RawNode[] = [];
    if (!OPAQUE_TAGS.has(el.tagName.toUpperCase())) {
      for (const child of Array.from(el.childNodes)) {
        if (child.nodeType === Node.TEXT_NODE) {
          const text = child.textContent ?? '';
          if (text.trim() !== '') children.push({ type: 'text', text });
        } else if (isElement(child)) {
          if (!SKIPPED_TAGS.has(child.tagName)) children.push(walk(child, win));
        }
      }
    }

    const node: RawElementNode = {
      type: 'element',
      tagName: el.tagName.toLowerCase(),
      attributes,
      xpath: xpathOf(el),
      rect,
      style: {
        display: computed.display,
        visibility: computed.visibility,
        opacity: computed.opacity,
        cursor: computed.cursor,
      },
      ...(isTopElement === undefined ? {} : { isTopElement }),
      children,
    };

    if (isFrame(el)) {
      let frameDocument: Document | null = null;
      try {
        frameDocument = el.contentDocument;
      } catch {
        frameDocument = null;
      }
      const frameWindow = frameDocument?.defaultView ?? null;
      node.frame =
        frameDocument?.documentElement && frameWindow
          ? {
              scrollX: frameWindow.scrollX,
              scrollY: frameWindow.scrollY,
              root: walk(frameDocument.documentElement, frameWindow),
            }
          : null;
    }

    return node;
  };

  const root = document.documentElement;
  return {
    url: window.location.href,
    title: document.title,
    viewport: {
      width: window.innerWidth,
      height: window.innerHeight,
      scrollX: window.scrollX,
      scrollY: window.scrollY,
      pageWidth: root.scrollWidth,
      pageHeight: root.scrollHeight,
    },
    root: walk(root, window),
  };
}
