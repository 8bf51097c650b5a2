import { z } from 'zod';

export const DEFAULT_INCLUDE_ATTRIBUTES = [
  'title',
  'type',
  'name',
  'role',
  'tabindex',
  'aria-label',
  'placeholder',
  'value',
  'alt',
  'aria-expanded',
] as const;

export const AgentConfigSchema = z.object({
  maxSteps: z.number().int().positive().default(100),
  maxActionsPerStep: z.number().int().positive().default(10),
  maxConsecutiveFailures: z.number().int().positive().default(3),
  maxValidationAttempts: z.number().int().positive().default(3),
  maxStepRetries: z.number().int().nonnegative().default(2),
  retryDelayMs: z.number().int().nonnegative().default(10_000),
  rateLimitBaseDelayMs: z.number().int().nonnegative().default(5_000),
  rateLimitMaxDelayMs: z.number().int().nonnegative().default(60_000),
  captureTimeoutMs: z.number().int().positive().default(30_000),
  reasonerTimeoutMs: z.number().int().positive().default(120_000),
  actionTimeoutMs: z.number().int().positive().default(30_000),
  waitBetweenActionsMs: z.number().int().nonnegative().default(500),
  planningInterval: z.number().int().nonnegative().default(0),
  useVision: z.boolean().default(true),
  maxInputTokens: z.number().int().positive().default(128_000),
  imageTokens: z.number().int().nonnegative().default(800),
  charsPerToken: z.number().positive().default(3),
  viewportExpansion: z.number().int().min(-1).default(500),
  includeAttributes: z.array(z.string()).default([...DEFAULT_INCLUDE_ATTRIBUTES]),
  sensitiveData: z.record(z.string()).default({}),
  excludeActions: z.array(z.string()).default([]),
  checkForNewElements: z.boolean().default(true),
  stuckRepeatThreshold: z.number().int().min(2).default(3),
  pauseOnUserAction: z.boolean().default(true),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
