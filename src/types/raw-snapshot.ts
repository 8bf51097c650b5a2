import type { TabInfo, ViewportInfo } from './dom.js';

export interface RawRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RawStyle {
  display?: string;
  visibility?: string;
  opacity?: string;
  cursor?: string;
}

export interface RawTextNode {
  type: 'text';
  text: string;
}

export interface RawFrameContent {
  scrollX: number;
  scrollY: number;
  root: RawElementNode;
}

export interface RawElementNode {
  type: 'element';
  tagName: string;
  attributes: Record<string, string>;
  xpath: string;
  /** Box in the coordinates of the document that owns the element. */
  rect: RawRect | null;
  style?: RawStyle;
  /** False when another element covers the element's centre point. */
  isTopElement?: boolean;
  children: RawNode[];
  /** Content document of an iframe; null when it could not be read (cross-origin). */
  frame?: RawFrameContent | null;
}

export type RawNode = RawElementNode | RawTextNode;

/** What the browser driver hands to the DomIndexer for one capture. */
export interface RawPageSnapshot {
  url: string;
  title: string;
  viewport: ViewportInfo;
  root: RawElementNode;
  tabs?: TabInfo[];
  /** Base64 PNG. */
  screenshot?: string;
}
