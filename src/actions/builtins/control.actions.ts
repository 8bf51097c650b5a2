import { z } from 'zod';
import type { RegisteredAction } from '../action-types.js';
import { defineAction } from '../registry.js';
import { needsUser } from './results.js';

/**
 * `done` finishes the task. With an output schema the reasoner must fill
 * that record instead of free text, and the result carries its JSON.
 */
export function createDoneAction(outputSchema?: z.AnyZodObject): RegisteredAction {
  const description = 'Complete the task. Include everything the user asked for in the result.';
  if (outputSchema) {
    return defineAction({
      name: 'done',
      description,
      schema: outputSchema,
      async handler(params) {
        return { isDone: true, extractedContent: JSON.stringify(params), includeInMemory: true };
      },
    });
  }
  return defineAction({
    name: 'done',
    description,
    schema: z.object({ text: z.string() }),
    async handler({ text }) {
      return { isDone: true, extractedContent: text, includeInMemory: true };
    },
  });
}

export const requestUserHelpAction = defineAction({
  name: 'request_user_help',
  description:
    'Ask the user to take over for something you must not do yourself: CAPTCHAs, logins, payments or verifications',
  schema: z.object({ message: z.string().min(1), reason: z.string().default('') }),
  async handler({ message, reason }) {
    return needsUser(`Waiting for the user: ${message}`, {
      type: 'help',
      message,
      ...(reason ? { reason } : {}),
    });
  },
});

export const askUserQuestionAction = defineAction({
  name: 'ask_user_question',
  description: 'Ask the user a question when the task is ambiguous or needs a decision',
  schema: z.object({
    question: z.string().min(1),
    context: z.string().default(''),
    options: z.array(z.string()).optional(),
  }),
  async handler({ question, context, options }) {
    return needsUser(`Asked the user: ${question}`, {
      type: 'question',
      message: question,
      ...(context ? { context } : {}),
      ...(options && options.length > 0 ? { options } : {}),
    });
  },
});
