import type { z } from 'zod';
import type { ActionResult } from '../types/action-result.js';
import type { DOMElementNode } from '../types/dom.js';
import type { BrowserState } from '../dom/browser-state.js';
import type { BrowserDriver } from '../engines/browser-driver.js';

export interface ActionContext {
  driver: BrowserDriver;
  /** The capture the reasoner saw when it chose this action. */
  state: BrowserState;
  /** Resolved target of an element action (one whose params carry `index`). */
  target?: DOMElementNode;
}

export interface ActionDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  /** Shown to the reasoner next to the parameter list. */
  description: string;
  schema: S;
  handler: (params: z.output<S>, ctx: ActionContext) => Promise<ActionResult>;
}

/** An invocation whose parameters passed the action's schema. */
export interface ParsedAction {
  name: string;
  params: unknown;
  /** Highlight index the action targets, if any. */
  index?: number;
  run(ctx: ActionContext): Promise<ActionResult>;
}

/** Type-erased entry of the registry. */
export interface RegisteredAction {
  name: string;
  description: string;
  /** `name: {param: type, ...}` line for the system prompt. */
  signature: string;
  parse(params: unknown): ParsedAction;
}
