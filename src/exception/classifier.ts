import type { FailureKind } from '../types/action-result.js';
import {
  AgentError,
  errorMessage,
  RateLimitError,
  ReasonerError,
} from './errors.js';

/**
 * Map any thrown value to a FailureKind. Errors from this package are
 * classified by class; foreign errors (Playwright, fetch, zod) by message.
 * Anything that matches nothing is fatal.
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof AgentError) {
    return classifyAgentError(error);
  }

  const text = errorMessage(error).toLowerCase();
  const name = error instanceof Error ? error.name : '';

  if (isRateLimited(text)) {
    return 'rate_limit';
  }

  if (name === 'TimeoutError' || name === 'AbortError' || isTransient(text)) {
    return 'transient';
  }

  if (isNotActionable(text)) {
    return 'action_failed';
  }

  if (name === 'ZodError' || name === 'SyntaxError') {
    return 'validation';
  }

  return 'fatal';
}

function classifyAgentError(error: AgentError): FailureKind {
  switch (error.kind) {
    case 'validation':
      return 'validation';
    case 'element_not_found':
      return 'element_not_found';
    case 'navigation':
      return 'transient';
    case 'rate_limit':
      return 'rate_limit';
    case 'reasoner':
      return error instanceof ReasonerError && error.retryable ? 'transient' : 'fatal';
    case 'fatal':
    case 'config':
      return 'fatal';
    default: {
      const _exhaustive: never = error.kind;
      return 'fatal';
    }
  }
}

function isRateLimited(text: string): boolean {
  const patterns = [
    'rate limit',
    'rate_limit',
    'ratelimit',
    'too many requests',
    'http 429',
    'quota exceeded',
    'resource_exhausted',
  ];
  return patterns.some((p) => text.includes(p));
}

function isTransient(text: string): boolean {
  const patterns = [
    'timeout',
    'timed out',
    'net::err_',
    'econnreset',
    'econnrefused',
    'socket hang up',
    'target closed',
    'target page, context or browser has been closed',
    'page has been closed',
    'browser has been closed',
    'navigation failed',
    'frame was detached',
    'execution context was destroyed',
    'disconnected',
  ];
  return patterns.some((p) => text.includes(p));
}

function isNotActionable(text: string): boolean {
  const patterns = [
    'not actionable',
    'not clickable',
    'element is not visible',
    'element is not enabled',
    'element is not stable',
    'element is not attached',
    'not an <input>',
    'intercepts pointer events',
    'intercepted',
    'is not a select',
    'did not find some options',
    'strict mode violation',
  ];
  return patterns.some((p) => text.includes(p));
}

/** Extracts `retryAfterMs` when the failure carries one. */
export function retryAfterOf(error: unknown): number | undefined {
  return error instanceof RateLimitError ? error.retryAfterMs : undefined;
}
