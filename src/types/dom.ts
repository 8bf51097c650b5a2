export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ViewportInfo {
  width: number;
  height: number;
  scrollX: number;
  scrollY: number;
  pageWidth: number;
  pageHeight: number;
}

/** Index of a node inside an ElementTree arena. */
export type NodeHandle = number;

export interface DOMElementNode {
  type: 'element';
  handle: NodeHandle;
  parent: NodeHandle | null;
  children: readonly NodeHandle[];
  tagName: string;
  attributes: Readonly<Record<string, string>>;
  /** XPath relative to the document that owns the element. */
  xpath: string;
  /** XPaths of the enclosing iframe elements, outermost first. Empty for top-level elements. */
  frameChain: readonly string[];
  /** Box in top-document coordinates. */
  boundingBox: BoundingBox | null;
  /** Box relative to the top-level viewport. */
  viewportCoordinates: BoundingBox | null;
  isVisible: boolean;
  isInteractive: boolean;
  isInViewport: boolean;
  highlightIndex: number | null;
  captureId: string;
}

export interface DOMTextNode {
  type: 'text';
  handle: NodeHandle;
  parent: NodeHandle | null;
  text: string;
  isVisible: boolean;
}

export type DOMNode = DOMElementNode | DOMTextNode;

export interface TabInfo {
  pageId: number;
  url: string;
  title: string;
}

/**
 * Addresses one highlighted element of one capture. A ref is only
 * meaningful against the BrowserState whose captureId it carries.
 */
export interface ElementRef {
  captureId: string;
  index: number;
}

/** Capture-independent description of an element, used by History export and replay. */
export interface ElementLocator {
  index: number;
  tagName: string;
  xpath: string;
  frameChain: string[];
}
