import type { ActionResult, UserActionRequest } from '../../types/action-result.js';
import type { DOMElementNode } from '../../types/dom.js';
import { FatalError } from '../../exception/errors.js';
import type { ActionContext } from '../action-types.js';

export function succeeded(extractedContent: string, includeInMemory = true): ActionResult {
  return { isDone: false, extractedContent, includeInMemory };
}

/** An action-level failure: recorded for the reasoner, halts the rest of the batch. */
export function refused(error: string): ActionResult {
  return { isDone: false, error, errorKind: 'action_failed', includeInMemory: true };
}

export function needsUser(extractedContent: string, userAction: UserActionRequest): ActionResult {
  return { isDone: false, extractedContent, includeInMemory: true, userAction };
}

/** The dispatcher resolves the target before an element action runs. */
export function targetOf(ctx: ActionContext, action: string): DOMElementNode {
  if (!ctx.target) {
    throw new FatalError(`Action "${action}" ran without a resolved target element`);
  }
  return ctx.target;
}

export function describeElement(ctx: ActionContext, element: DOMElementNode): string {
  const text = ctx.state.tree.textUntilNextClickable(element.handle);
  return text ? `<${element.tagName}> "${text}"` : `<${element.tagName}>`;
}
