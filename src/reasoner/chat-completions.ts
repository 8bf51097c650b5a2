import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ChatMessage } from '../types/message.js';
import { RateLimitError, ReasonerError } from '../exception/errors.js';
import { HttpClient, HttpClientError } from './http-client.js';
import type { Planner, Reasoner } from './reasoner.js';

export interface ChatCompletionsOptions {
  client: HttpClient;
  model: string;
  temperature?: number;
  timeoutMs?: number;
  /** Ask the endpoint for a JSON object reply. Not every provider supports it. */
  jsonMode?: boolean;
  requestId?: () => string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

type WireContent =
  | string
  | ({ type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } })[];

const PLANNER_INSTRUCTION = [
  'You are planning for a browser automation agent. Based on the conversation so far, reply with a short plan:',
  '1. what has been achieved,',
  '2. what remains to be done,',
  '3. the next two or three concrete steps.',
  'Reply in plain text, not JSON.',
].join('\n');

/**
 * Reasoner and Planner over an OpenAI-compatible POST /chat/completions.
 *
 * HTTP 429 becomes RateLimitError (with Retry-After when present); 5xx,
 * network failures and timeouts become retryable ReasonerErrors; any other
 * status is a non-retryable ReasonerError.
 */
export class ChatCompletionsReasoner implements Reasoner, Planner {
  private readonly newRequestId: () => string;

  constructor(private readonly options: ChatCompletionsOptions) {
    this.newRequestId = options.requestId ?? randomUUID;
  }

  async invoke(messages: ChatMessage[]): Promise<unknown> {
    return this.complete(messages, this.options.jsonMode ?? true);
  }

  async plan(messages: ChatMessage[]): Promise<string> {
    const planning: ChatMessage[] = [...messages, { role: 'user', kind: 'plan', content: PLANNER_INSTRUCTION }];
    return this.complete(planning, false);
  }

  private async complete(messages: ChatMessage[], jsonMode: boolean): Promise<string> {
    const requestId = this.newRequestId();
    const body = {
      model: this.options.model,
      temperature: this.options.temperature ?? 0,
      messages: messages.map((message) => ({ role: message.role, content: toWireContent(message) })),
      ...(jsonMode ? { response_format: { type: 'json_object' } } : {}),
    };

    let data: unknown;
    try {
      ({ data } = await this.options.client.post('/chat/completions', body, requestId, this.options.timeoutMs));
    } catch (error) {
      throw toReasonerError(error);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ReasonerError(
        `Unexpected chat completion response (request ${requestId}): ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        false,
      );
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}

function toWireContent(message: ChatMessage): WireContent {
  if (typeof message.content === 'string') return message.content;
  return message.content.map((part) =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: { url: `data:${part.mediaType};base64,${part.data}` } },
  );
}

function toReasonerError(error: unknown): Error {
  if (!(error instanceof HttpClientError)) {
    return new ReasonerError(error instanceof Error ? error.message : String(error), true, undefined, {
      cause: error,
    });
  }
  if (error.status === 429) {
    return new RateLimitError(`Reasoner rate limited: ${error.message}`, error.retryAfterMs, { cause: error });
  }
  const retryable = error.status === 0 || error.status >= 500;
  return new ReasonerError(`Reasoner request failed: ${error.message}`, retryable, error.status || undefined, {
    cause: error,
  });
}
