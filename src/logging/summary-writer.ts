import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunResult } from '../types/run.js';
import type { RunMetrics } from '../metrics/collector.js';

export interface SummaryOptions {
  runDir: string;
  result: RunResult;
  metrics?: RunMetrics;
  operatorNotes?: string[];
}

/**
 * Write a human-readable `summary.md` for a finished run.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  const { runDir, result, metrics, operatorNotes } = options;
  const md = buildSummaryMarkdown(result, metrics, operatorNotes);
  await writeFile(join(runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(result: RunResult, metrics?: RunMetrics, operatorNotes?: string[]): string {
  const history = result.history;
  const failedSteps = history.errors().filter((error) => error !== null).length;

  const lines: string[] = [
    '# Run Summary',
    `- Task: ${history.task}`,
    `- Result: ${describeOutcome(result)}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Steps: ${history.length} (${failedSteps} with errors)`,
  ];
  if (result.finalResult !== undefined) {
    lines.push(`- Final result: ${result.finalResult}`);
  }
  if (result.error) {
    lines.push(`- Error: ${result.error}`);
  }

  lines.push('', '## Steps');
  if (history.length === 0) {
    lines.push('- No steps were executed');
  }
  for (const entry of history.steps) {
    const actions = entry.actions.map((action) =>
      action.outcome === 'executed' ? action.name : `${action.name} (rejected)`,
    );
    const where = entry.state ? ` @ ${entry.state.url}` : '';
    lines.push(`${entry.stepNumber}. ${actions.length > 0 ? actions.join(', ') : 'no actions'}${where}`);
    const errors = entry.results.flatMap((r) => (r.error ? [r.error] : []));
    if (entry.error) errors.push(entry.error);
    for (const error of errors) {
      lines.push(`   - error: ${error}`);
    }
  }

  if (metrics) {
    lines.push('', '## Metrics');
    lines.push(`- Actions executed: ${metrics.actions.executed} (${metrics.actions.failed} failed, ${metrics.actions.rejected} rejected)`);
    lines.push(`- Rejected reasoner outputs: ${metrics.rejectedOutputs}`);
    lines.push(`- Retries: ${metrics.retries}`);
    lines.push(`- Estimated prompt tokens: ${metrics.estimatedPromptTokens}`);
  }

  lines.push('', '## Run Info');
  lines.push(`- Run ID: ${result.runId}`);
  lines.push(`- Final state: ${result.state} (${result.reason})`);

  if (operatorNotes && operatorNotes.length > 0) {
    lines.push('');
    lines.push('## Operator Notes');
    for (const note of operatorNotes) {
      lines.push(`- ${note}`);
    }
  }

  return lines.join('\n') + '\n';
}

function describeOutcome(result: RunResult): string {
  switch (result.reason) {
    case 'completed':
      return 'Completed';
    case 'max_steps_reached':
      return 'Stopped at the step limit';
    case 'failure_budget_exhausted':
      return 'Failed (too many consecutive failures)';
    case 'fatal_error':
      return 'Failed (fatal error)';
    case 'stopped':
      return 'Stopped on request';
  }
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
