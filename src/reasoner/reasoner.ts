import type { ChatMessage } from '../types/message.js';

/**
 * The reasoning model. Returns its raw reply (JSON text or an already
 * parsed object); the agent validates it against the AgentOutput schema.
 */
export interface Reasoner {
  invoke(messages: ChatMessage[]): Promise<unknown>;
}

/** Secondary pass that produces a free-text plan hint for the next step. */
export interface Planner {
  plan(messages: ChatMessage[]): Promise<string>;
}
