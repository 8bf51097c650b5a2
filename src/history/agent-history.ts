import type { ActionResult } from '../types/action-result.js';
import type { AgentHistoryEntry, DispatchedAction } from '../types/agent.js';

/**
 * Append-only record of a run. Step numbers start at 1 and have no gaps;
 * an entry never changes once appended.
 */
export class AgentHistory {
  private readonly entries: AgentHistoryEntry[] = [];

  constructor(readonly task: string) {}

  append(entry: AgentHistoryEntry): void {
    const expected = this.entries.length + 1;
    if (entry.stepNumber !== expected) {
      throw new RangeError(`History expects step ${expected}, got step ${entry.stepNumber}`);
    }
    this.entries.push(
      Object.freeze({
        ...entry,
        actions: Object.freeze([...entry.actions]),
        results: Object.freeze([...entry.results]),
        rejections: Object.freeze([...entry.rejections]),
        notes: Object.freeze([...entry.notes]),
      }),
    );
  }

  get length(): number {
    return this.entries.length;
  }

  get steps(): readonly AgentHistoryEntry[] {
    return this.entries;
  }

  last(): AgentHistoryEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Whether the last action of the last step signalled completion. */
  isDone(): boolean {
    const results = this.last()?.results ?? [];
    return results[results.length - 1]?.isDone ?? false;
  }

  finalResult(): string | undefined {
    if (!this.isDone()) return undefined;
    const results = this.last()?.results ?? [];
    return results[results.length - 1]?.extractedContent;
  }

  /** Per step: the joined errors of that step, or null. */
  errors(): (string | null)[] {
    return this.entries.map((entry) => {
      const errors = entry.results.flatMap((result) => (result.error ? [result.error] : []));
      if (entry.error) errors.push(entry.error);
      return errors.length > 0 ? errors.join('\n') : null;
    });
  }

  urls(): (string | null)[] {
    return this.entries.map((entry) => entry.state?.url ?? null);
  }

  executedActions(): DispatchedAction[] {
    return this.entries.flatMap((entry) => entry.actions.filter((action) => action.outcome === 'executed'));
  }

  extractedContent(): string[] {
    return this.entries.flatMap((entry) =>
      entry.results.flatMap((result: ActionResult) => (result.extractedContent ? [result.extractedContent] : [])),
    );
  }
}
