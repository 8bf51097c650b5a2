import type { z } from 'zod';
import { ActionRegistry } from './registry.js';
import {
  goBackAction,
  goToUrlAction,
  openTabAction,
  searchGoogleAction,
  switchTabAction,
  waitAction,
} from './builtins/navigation.actions.js';
import {
  clickElementAction,
  getDropdownOptionsAction,
  inputTextAction,
  selectDropdownOptionAction,
} from './builtins/element.actions.js';
import {
  extractContentAction,
  scrollDownAction,
  scrollToTextAction,
  scrollUpAction,
  sendKeysAction,
} from './builtins/page.actions.js';
import { askUserQuestionAction, createDoneAction, requestUserHelpAction } from './builtins/control.actions.js';

export interface DefaultRegistryOptions {
  excludeActions?: readonly string[];
  /** Typed result record for `done`. */
  outputSchema?: z.AnyZodObject;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ActionRegistry {
  const registry = new ActionRegistry();
  const builtins = [
    createDoneAction(options.outputSchema),
    searchGoogleAction,
    goToUrlAction,
    goBackAction,
    waitAction,
    clickElementAction,
    inputTextAction,
    switchTabAction,
    openTabAction,
    extractContentAction,
    scrollDownAction,
    scrollUpAction,
    sendKeysAction,
    scrollToTextAction,
    getDropdownOptionsAction,
    selectDropdownOptionAction,
    requestUserHelpAction,
    askUserQuestionAction,
  ];
  for (const action of builtins) {
    registry.register(action);
  }
  registry.exclude(options.excludeActions ?? []);
  return registry;
}
