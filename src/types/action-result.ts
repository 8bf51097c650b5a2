export type FailureKind =
  | 'validation'
  | 'element_not_found'
  | 'action_failed'
  | 'transient'
  | 'rate_limit'
  | 'fatal';

export interface UserActionRequest {
  type: 'help' | 'question';
  message: string;
  reason?: string;
  context?: string;
  options?: string[];
}

export interface ActionResult {
  isDone: boolean;
  extractedContent?: string;
  error?: string;
  errorKind?: FailureKind;
  /** Whether the result is folded into the context of later steps. */
  includeInMemory: boolean;
  userAction?: UserActionRequest;
}
