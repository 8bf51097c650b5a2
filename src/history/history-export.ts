import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AgentHistory } from './agent-history.js';
import { HistoryExportSchema, HISTORY_EXPORT_VERSION, type HistoryExport } from '../schemas/history.schema.js';
import { errorMessage, ValidationError } from '../exception/errors.js';

/**
 * JSON-safe form of a History. Page captures are reduced to url, title and
 * capture id; element targets keep their xpath and frame chain so a replay
 * can find them again.
 */
export function exportHistory(history: AgentHistory): HistoryExport {
  return {
    version: HISTORY_EXPORT_VERSION,
    task: history.task,
    steps: history.steps.map((entry) => ({
      stepNumber: entry.stepNumber,
      timestamp: entry.timestamp,
      durationMs: entry.durationMs,
      url: entry.state?.url ?? null,
      title: entry.state?.title ?? null,
      captureId: entry.state?.captureId ?? null,
      modelOutput: entry.modelOutput
        ? {
            currentState: { ...entry.modelOutput.currentState },
            actions: entry.modelOutput.actions.map((action) => ({ name: action.name, params: action.params })),
          }
        : null,
      actions: entry.actions.map((action) => ({
        name: action.name,
        params: action.params,
        outcome: action.outcome,
        ...(action.target ? { target: { ...action.target, frameChain: [...action.target.frameChain] } } : {}),
      })),
      results: entry.results.map((result) => ({ ...result })),
      rejections: [...entry.rejections],
      notes: [...entry.notes],
      ...(entry.error ? { error: entry.error } : {}),
    })),
  };
}

export function parseHistoryExport(value: unknown): HistoryExport {
  const parsed = HistoryExportSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid history export: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function saveHistory(history: AgentHistory | HistoryExport, filePath: string): Promise<void> {
  const data = 'version' in history ? history : exportHistory(history);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

export async function loadHistory(filePath: string): Promise<HistoryExport> {
  const content = await readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`History file ${filePath} is not valid JSON`, [errorMessage(error)], { cause: error });
  }
  return parseHistoryExport(json);
}

export interface RecordedAction {
  stepNumber: number;
  name: string;
  params: unknown;
}

/** Every executed action, in the order it ran. */
export function actionSequence(data: HistoryExport): RecordedAction[] {
  return data.steps.flatMap((step) =>
    step.actions
      .filter((action) => action.outcome === 'executed')
      .map((action) => ({ stepNumber: step.stepNumber, name: action.name, params: action.params })),
  );
}
