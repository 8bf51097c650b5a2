import type { ChatMessage } from '../types/message.js';

export interface TokenEstimator {
  text(text: string): number;
  /** Flat charge per attached image. */
  image(): number;
}

/** Length-based proxy: one token per `charsPerToken` characters, rounded up. */
export class CharRatioEstimator implements TokenEstimator {
  constructor(
    private readonly charsPerToken: number,
    private readonly imageTokens: number,
  ) {
    if (charsPerToken <= 0) {
      throw new RangeError('charsPerToken must be positive');
    }
  }

  text(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }

  image(): number {
    return this.imageTokens;
  }
}

export function messageTokens(message: ChatMessage, estimator: TokenEstimator): number {
  if (typeof message.content === 'string') {
    return estimator.text(message.content);
  }
  let total = 0;
  for (const part of message.content) {
    total += part.type === 'text' ? estimator.text(part.text) : estimator.image();
  }
  return total;
}

export function totalTokens(messages: readonly ChatMessage[], estimator: TokenEstimator): number {
  return messages.reduce((sum, message) => sum + messageTokens(message, estimator), 0);
}

/** Longest prefix of `text` whose estimate fits `maxTokens`. */
export function truncateToTokens(text: string, maxTokens: number, estimator: TokenEstimator): string {
  if (estimator.text(text) <= maxTokens) return text;
  if (maxTokens <= 0) return '';

  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (estimator.text(text.slice(0, mid)) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return text.slice(0, low);
}
