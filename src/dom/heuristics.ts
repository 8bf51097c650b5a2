import type { BoundingBox, ViewportInfo } from '../types/dom.js';
import type { RawElementNode } from '../types/raw-snapshot.js';

const INTERACTIVE_TAGS = new Set([
  'a',
  'button',
  'input',
  'select',
  'textarea',
  'details',
  'summary',
  'option',
  'menuitem',
]);

const INTERACTIVE_ROLES = new Set([
  'button',
  'link',
  'checkbox',
  'radio',
  'switch',
  'tab',
  'menuitem',
  'menuitemcheckbox',
  'menuitemradio',
  'option',
  'textbox',
  'searchbox',
  'combobox',
  'slider',
  'spinbutton',
  'treeitem',
]);

const HANDLER_ATTRIBUTES = ['onclick', 'onmousedown', 'ontouchstart', 'ng-click', '@click', 'v-on:click'];

export function hasArea(box: BoundingBox | null): box is BoundingBox {
  return box !== null && box.width > 0 && box.height > 0;
}

/**
 * An element is visible when it has a non-zero box and is not hidden by
 * style or attribute.
 */
export function isElementVisible(raw: RawElementNode, box: BoundingBox | null): boolean {
  if (!hasArea(box)) return false;
  if ('hidden' in raw.attributes) return false;
  if (raw.tagName === 'input' && raw.attributes.type?.toLowerCase() === 'hidden') return false;

  const style = raw.style;
  if (!style) return true;
  if (style.display === 'none') return false;
  if (style.visibility === 'hidden' || style.visibility === 'collapse') return false;
  if (style.opacity !== undefined && Number.parseFloat(style.opacity) === 0) return false;
  return true;
}

/**
 * Tag, role, handler-attribute and cursor heuristics. Disabled controls
 * are never interactive.
 */
export function isElementInteractive(raw: RawElementNode): boolean {
  const attrs = raw.attributes;
  if ('disabled' in attrs || attrs['aria-disabled'] === 'true') return false;

  if (INTERACTIVE_TAGS.has(raw.tagName)) {
    return !(raw.tagName === 'input' && attrs.type?.toLowerCase() === 'hidden');
  }

  const role = attrs.role?.toLowerCase();
  if (role && INTERACTIVE_ROLES.has(role)) return true;

  if (HANDLER_ATTRIBUTES.some((name) => name in attrs)) return true;

  const editable = attrs.contenteditable;
  if (editable === '' || editable === 'true') return true;

  const tabindex = attrs.tabindex;
  if (tabindex !== undefined && Number.parseInt(tabindex, 10) >= 0) return true;

  return raw.style?.cursor === 'pointer';
}

/**
 * Whether a box intersects the viewport grown by `expansion` pixels on every
 * side. An expansion of -1 admits the whole page.
 */
export function isInExpandedViewport(
  box: BoundingBox,
  viewport: ViewportInfo,
  expansion: number,
): boolean {
  if (expansion < 0) return true;

  const top = viewport.scrollY - expansion;
  const bottom = viewport.scrollY + viewport.height + expansion;
  const left = viewport.scrollX - expansion;
  const right = viewport.scrollX + viewport.width + expansion;

  return box.y + box.height > top && box.y < bottom && box.x + box.width > left && box.x < right;
}

export function boxKey(box: BoundingBox): string {
  return `${box.x},${box.y},${box.width},${box.height}`;
}
