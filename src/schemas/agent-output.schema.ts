import { z } from 'zod';
import type { AgentOutput } from '../types/agent.js';
import { errorMessage, ValidationError } from '../exception/errors.js';

export const CurrentStateSchema = z.object({
  page_summary: z.string().default(''),
  evaluation_previous_goal: z.string(),
  memory: z.string(),
  next_goal: z.string(),
});

/** `{ "click_element": { "index": 3 } }` - exactly one action name per item. */
export const ActionItemSchema = z
  .record(z.unknown())
  .refine((item) => Object.keys(item).length === 1, {
    message: 'each action item must name exactly one action',
  });

export const AgentOutputSchema = z.object({
  current_state: CurrentStateSchema,
  action: z.array(ActionItemSchema).min(1),
});

export type AgentOutputWire = z.infer<typeof AgentOutputSchema>;

/**
 * Validate what the reasoner returned. Accepts an already-parsed object or
 * JSON text, optionally wrapped in a markdown code fence.
 */
export function parseAgentOutput(raw: unknown): AgentOutput {
  const value = typeof raw === 'string' ? parseJsonText(raw) : raw;
  const parsed = AgentOutputSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid reasoner output: ${issues.join('; ')}`, issues);
  }
  return toAgentOutput(parsed.data);
}

export function toAgentOutput(wire: AgentOutputWire): AgentOutput {
  return {
    currentState: {
      pageSummary: wire.current_state.page_summary,
      evaluationPreviousGoal: wire.current_state.evaluation_previous_goal,
      memory: wire.current_state.memory,
      nextGoal: wire.current_state.next_goal,
    },
    actions: wire.action.flatMap((item) =>
      Object.entries(item).map(([name, params]) => ({ name, params })),
    ),
  };
}

/** Inverse of toAgentOutput, used when the output goes back into the conversation. */
export function toWire(output: AgentOutput): AgentOutputWire {
  return {
    current_state: {
      page_summary: output.currentState.pageSummary,
      evaluation_previous_goal: output.currentState.evaluationPreviousGoal,
      memory: output.currentState.memory,
      next_goal: output.currentState.nextGoal,
    },
    action: output.actions.map((action) => ({ [action.name]: action.params })),
  };
}

function parseJsonText(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  const body = (fenced ? fenced[1] : text).trim();
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ValidationError('Reasoner output is not valid JSON', [errorMessage(error)], { cause: error });
  }
}
