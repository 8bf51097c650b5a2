import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { AgentEvent, EventSink } from '../events/event-sink.js';
import type { AgentHistoryEntry } from '../types/agent.js';
import type { RenderOptions } from '../dom/element-tree.js';
import type { SensitiveDataFilter } from '../context/sensitive-data.js';

export interface RunLoggerOptions {
  /** Masks secrets in everything written. */
  filter?: SensitiveDataFilter;
  /** How page state is rendered into `state_<n>.txt`. */
  render?: RenderOptions;
}

/**
 * File log of one run:
 *   events.jsonl      every AgentEvent, timestamped
 *   steps.jsonl       one record per History entry
 *   step_<n>.png      the screenshot of each step, when captured
 *   state_<n>.txt     the element list the reasoner saw
 */
export class RunLogger implements EventSink {
  private eventsPath: string;
  private stepsPath: string;
  private initialized = false;

  constructor(
    private runDir: string,
    private options: RunLoggerOptions = {},
  ) {
    this.eventsPath = join(runDir, 'events.jsonl');
    this.stepsPath = join(runDir, 'steps.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  private mask(text: string): string {
    return this.options.filter ? this.options.filter.mask(text) : text;
  }

  async emit(event: AgentEvent): Promise<void> {
    await this.ensureDir();
    const entry = { timestamp: new Date().toISOString(), ...event };
    await appendFile(this.eventsPath, this.mask(JSON.stringify(entry)) + '\n', 'utf-8');
  }

  async logStep(entry: AgentHistoryEntry): Promise<void> {
    await this.ensureDir();
    const record = {
      timestamp: entry.timestamp,
      stepNumber: entry.stepNumber,
      durationMs: entry.durationMs,
      url: entry.state?.url ?? null,
      title: entry.state?.title ?? null,
      nextGoal: entry.modelOutput?.currentState.nextGoal ?? null,
      actions: entry.actions.map((action) => ({ name: action.name, params: action.params, outcome: action.outcome })),
      errors: entry.results.flatMap((result) => (result.error ? [result.error] : [])),
      rejections: entry.rejections,
      notes: entry.notes,
      ...(entry.error ? { error: entry.error } : {}),
    };
    await appendFile(this.stepsPath, this.mask(JSON.stringify(record)) + '\n', 'utf-8');

    if (entry.state?.screenshot) {
      await this.saveScreenshot(entry.stepNumber, Buffer.from(entry.state.screenshot, 'base64'));
    }
    if (entry.state && this.options.render) {
      await this.saveStateText(entry.stepNumber, entry.state.render(this.options.render));
    }
  }

  async logHistory(entries: readonly AgentHistoryEntry[]): Promise<void> {
    for (const entry of entries) {
      await this.logStep(entry);
    }
  }

  async saveScreenshot(stepNumber: number, buffer: Buffer): Promise<void> {
    await this.ensureDir();
    await writeFile(join(this.runDir, `step_${stepNumber}.png`), buffer);
  }

  async saveStateText(stepNumber: number, text: string): Promise<void> {
    await this.ensureDir();
    await writeFile(join(this.runDir, `state_${stepNumber}.txt`), this.mask(text), 'utf-8');
  }

  getRunDir(): string {
    return this.runDir;
  }
}
