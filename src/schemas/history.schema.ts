import { z } from 'zod';

export const HISTORY_EXPORT_VERSION = 1;

const FailureKindSchema = z.enum([
  'validation',
  'element_not_found',
  'action_failed',
  'transient',
  'rate_limit',
  'fatal',
]);

export const UserActionRequestSchema = z.object({
  type: z.enum(['help', 'question']),
  message: z.string(),
  reason: z.string().optional(),
  context: z.string().optional(),
  options: z.array(z.string()).optional(),
});

export const ActionResultSchema = z.object({
  isDone: z.boolean(),
  extractedContent: z.string().optional(),
  error: z.string().optional(),
  errorKind: FailureKindSchema.optional(),
  includeInMemory: z.boolean(),
  userAction: UserActionRequestSchema.optional(),
});

export const ElementLocatorSchema = z.object({
  index: z.number().int(),
  tagName: z.string(),
  xpath: z.string(),
  frameChain: z.array(z.string()),
});

export const ExportedActionSchema = z.object({
  name: z.string(),
  params: z.unknown(),
  outcome: z.enum(['executed', 'rejected']),
  target: ElementLocatorSchema.optional(),
});

export const ExportedModelOutputSchema = z.object({
  currentState: z.object({
    pageSummary: z.string(),
    evaluationPreviousGoal: z.string(),
    memory: z.string(),
    nextGoal: z.string(),
  }),
  actions: z.array(z.object({ name: z.string(), params: z.unknown() })),
});

export const ExportedStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  timestamp: z.string(),
  durationMs: z.number().nonnegative(),
  url: z.string().nullable(),
  title: z.string().nullable(),
  captureId: z.string().nullable(),
  modelOutput: ExportedModelOutputSchema.nullable(),
  actions: z.array(ExportedActionSchema),
  results: z.array(ActionResultSchema),
  rejections: z.array(z.string()),
  notes: z.array(z.string()),
  error: z.string().optional(),
});

export const HistoryExportSchema = z
  .object({
    version: z.literal(HISTORY_EXPORT_VERSION),
    task: z.string(),
    steps: z.array(ExportedStepSchema),
  })
  .superRefine((value, ctx) => {
    value.steps.forEach((step, i) => {
      if (step.stepNumber !== i + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', i, 'stepNumber'],
          message: `expected step ${i + 1}, got ${step.stepNumber}`,
        });
      }
    });
  });

export type ExportedStep = z.infer<typeof ExportedStepSchema>;
export type ExportedAction = z.infer<typeof ExportedActionSchema>;
export type HistoryExport = z.infer<typeof HistoryExportSchema>;
