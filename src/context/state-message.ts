import type { ActionResult } from '../types/action-result.js';
import type { BrowserState } from '../dom/browser-state.js';
import type { RenderOptions } from '../dom/element-tree.js';

export interface StepInfo {
  stepNumber: number;
  maxSteps: number;
}

export interface StateTextInput {
  state: BrowserState;
  step: StepInfo;
  /** Results of the previous step; only their errors are repeated here. */
  previousResults: readonly ActionResult[];
  /** Extra lines for this step only, e.g. a stuck-loop warning. */
  hints?: readonly string[];
  now?: Date;
}

export function renderStateText(input: StateTextInput, render: RenderOptions): string {
  const { state, step } = input;
  const elements = state.render(render);

  const lines = [
    `Current url: ${state.url}`,
    `Page title: ${state.title}`,
    `Available tabs: ${JSON.stringify(state.tabs)}`,
    'Interactive elements from the current page:',
    state.pixelsAbove > 0
      ? `... ${state.pixelsAbove} pixels above - scroll up to see more ...`
      : '[Start of page]',
    elements === '' ? 'empty page' : elements,
    state.pixelsBelow > 0
      ? `... ${state.pixelsBelow} pixels below - scroll down to see more ...`
      : '[End of page]',
    `Current step: ${step.stepNumber}/${step.maxSteps}`,
    `Current date and time: ${formatTime(input.now ?? new Date())}`,
  ];

  input.previousResults.forEach((result, i) => {
    if (result.error) {
      lines.push(`Action error ${i + 1}/${input.previousResults.length}: ${result.error}`);
    }
  });

  for (const hint of input.hints ?? []) {
    lines.push(hint);
  }

  return lines.join('\n');
}

function formatTime(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}
