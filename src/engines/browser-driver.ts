import type { DOMElementNode } from '../types/dom.js';
import type { BrowserState } from '../dom/browser-state.js';

export interface CaptureOptions {
  screenshot: boolean;
}

/**
 * Everything the agent asks of the browser. Commands that act on an
 * element carry the resolved node; the driver finds it again on the page
 * through its frame chain and xpath.
 */
export type DriverCommand =
  | { type: 'navigate'; url: string }
  | { type: 'go_back' }
  | { type: 'wait'; ms: number }
  | { type: 'click'; target: DOMElementNode }
  | { type: 'input_text'; target: DOMElementNode; text: string }
  | { type: 'switch_tab'; pageId: number }
  | { type: 'open_tab'; url: string }
  | { type: 'read_page' }
  | { type: 'scroll'; direction: 'up' | 'down'; amount?: number }
  | { type: 'send_keys'; keys: string }
  | { type: 'scroll_to_text'; text: string }
  | { type: 'get_dropdown_options'; target: DOMElementNode }
  | { type: 'select_option'; target: DOMElementNode; text: string };

export type DriverCommandType = DriverCommand['type'];

export interface DriverOutcome {
  /** Short human-readable note on what happened. */
  detail?: string;
  /** Page text for `read_page`. */
  content?: string;
  newTabOpened?: boolean;
  /** `scroll_to_text`: whether the text was found. */
  found?: boolean;
  /** `get_dropdown_options`: option labels in document order. */
  options?: string[];
}

/**
 * Transport to a live browser. Implementations throw NavigationError for
 * timeouts and lost pages so the agent can retry the step.
 */
export interface BrowserDriver {
  captureState(options: CaptureOptions): Promise<BrowserState>;
  execute(command: DriverCommand): Promise<DriverOutcome>;
}
