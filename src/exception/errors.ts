import type { FailureKind } from '../types/action-result.js';

export type AgentErrorKind =
  | 'validation'
  | 'element_not_found'
  | 'navigation'
  | 'reasoner'
  | 'rate_limit'
  | 'fatal'
  | 'config';

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed reasoner output or malformed action parameters. */
export class ValidationError extends AgentError {
  readonly kind = 'validation';

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** An action referenced a highlight index that the current capture does not hold. */
export class ElementNotFoundError extends AgentError {
  readonly kind = 'element_not_found';

  constructor(
    public readonly index: number,
    message = `Element with index ${index} does not exist in the current page state`,
  ) {
    super(message);
  }
}

export type NavigationFailureReason = 'timeout' | 'transport' | 'navigation';

export class NavigationError extends AgentError {
  readonly kind = 'navigation';

  constructor(
    message: string,
    public readonly reason: NavigationFailureReason = 'navigation',
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ReasonerError extends AgentError {
  readonly kind = 'reasoner';

  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RateLimitError extends AgentError {
  readonly kind = 'rate_limit';

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FatalError extends AgentError {
  readonly kind = 'fatal';
}

export class ConfigError extends AgentError {
  readonly kind = 'config';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/** Renders an error for the reasoner and for History: `Kind: message`. */
export function describeFailure(kind: FailureKind, error: unknown): string {
  const label = error instanceof Error ? error.name : 'Error';
  return `${label} (${kind}): ${errorMessage(error)}`;
}
