import type { ActionResult } from '../types/action-result.js';
import type { DispatchedAction } from '../types/agent.js';

export type StuckKind = 'repeated_batch' | 'repeated_failure';

export interface StuckSignal {
  kind: StuckKind;
  /** First action of the repeated batch, or the first failing action. */
  action: string;
  repeats: number;
}

class RepeatCounter {
  private last: string | null = null;
  private count = 0;

  /** `null` marks a step with nothing to compare and clears the run. */
  next(signature: string | null): number {
    if (signature === null) this.count = 0;
    else this.count = signature === this.last ? this.count + 1 : 1;
    this.last = signature;
    return this.count;
  }
}

/**
 * Watches for the same executed batch (names and parameters) repeating
 * step after step, and for the same actions failing the same way.
 * A repeated failure wins over a repeated batch.
 */
export class StuckDetector {
  private batches = new RepeatCounter();
  private failures = new RepeatCounter();

  constructor(private readonly threshold: number) {}

  /** `results` is aligned one-to-one with `actions`. */
  observe(actions: readonly DispatchedAction[], results: readonly ActionResult[]): StuckSignal | null {
    const executed = actions.filter((action) => action.outcome === 'executed');
    const batchRepeats = this.batches.next(
      executed.length > 0 ? JSON.stringify(executed.map((action) => [action.name, action.params])) : null,
    );

    const failed = actions.flatMap((action, i) => {
      const result = results[i];
      return result?.error ? [[action.name, action.params, result.errorKind ?? null] as const] : [];
    });
    const failureRepeats = this.failures.next(failed.length > 0 ? JSON.stringify(failed) : null);

    if (failureRepeats >= this.threshold) {
      return { kind: 'repeated_failure', action: failed[0][0], repeats: failureRepeats };
    }
    if (batchRepeats >= this.threshold) {
      return { kind: 'repeated_batch', action: executed[0].name, repeats: batchRepeats };
    }
    return null;
  }

  reset(): void {
    this.batches = new RepeatCounter();
    this.failures = new RepeatCounter();
  }
}

export function stuckHint(signal: StuckSignal): string {
  switch (signal.kind) {
    case 'repeated_failure':
      return (
        `The same action (${signal.action}) has failed ${signal.repeats} times in a row. ` +
        'Do not repeat it; try a different approach.'
      );
    case 'repeated_batch':
      return (
        `You have repeated the same actions (starting with ${signal.action}) ${signal.repeats} times in a row ` +
        'without reaching the goal. Try a different approach.'
      );
  }
}
