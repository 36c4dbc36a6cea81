import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { errorMessage } from '../errors.js';
import type { Outcome, RunStatus, RunSummary } from '../types.js';

export const EXIT_CODES: Record<RunStatus, number> = {
  'all-succeeded': 0,
  'partial-failure': 1,
  'total-failure': 2,
};

export interface SyncRunEvents {
  outcome: (outcome: Outcome) => void;
  fatal: (error: Error) => void;
}

export interface SyncRun {
  on<K extends keyof SyncRunEvents>(event: K, listener: SyncRunEvents[K]): this;
  off<K extends keyof SyncRunEvents>(event: K, listener: SyncRunEvents[K]): this;
  emit<K extends keyof SyncRunEvents>(event: K, ...args: Parameters<SyncRunEvents[K]>): boolean;
}

/**
 * The outcome log of one invocation. Records are frozen on entry and never
 * touched again; `finalize` reduces them to the run's status.
 */
export class SyncRun extends EventEmitter {
  readonly id: string;
  readonly startedAt: number;
  private readonly outcomes: Outcome[] = [];
  private fatal: Error | null = null;

  constructor(id: string = randomUUID()) {
    super();
    this.id = id;
    this.startedAt = Date.now();
  }

  record(outcome: Outcome): void {
    const frozen = Object.freeze({ ...outcome, subject: Object.freeze({ ...outcome.subject }) });
    this.outcomes.push(frozen);
    this.emit('outcome', frozen);
  }

  /** Record a run-level error. Only the first one is kept. */
  fail(error: unknown): void {
    if (this.fatal) return;
    this.fatal = error instanceof Error ? error : new Error(errorMessage(error));
    this.emit('fatal', this.fatal);
  }

  get fatalError(): Error | null {
    return this.fatal;
  }

  getOutcomes(): readonly Outcome[] {
    return this.outcomes.slice();
  }

  finalize(): RunSummary {
    let succeeded = 0;
    let skipped = 0;
    let bytes = 0;
    const failures: RunSummary['failures'] = [];

    for (const outcome of this.outcomes) {
      switch (outcome.status) {
        case 'succeeded':
          succeeded++;
          bytes += outcome.bytes;
          break;
        case 'skipped':
          skipped++;
          break;
        case 'failed':
          failures.push(outcome);
          break;
      }
    }

    const status = classifyRun(succeeded + skipped, failures.length, this.fatal !== null);
    const summary: RunSummary = {
      runId: this.id,
      status,
      exitCode: EXIT_CODES[status],
      succeeded,
      skipped,
      failed: failures.length,
      bytes,
      failures,
    };
    if (this.fatal) summary.fatalError = this.fatal.message;
    return summary;
  }
}

export function classifyRun(completed: number, failed: number, fatal: boolean): RunStatus {
  if (!fatal && failed === 0) return 'all-succeeded';
  if (completed > 0) return 'partial-failure';
  return 'total-failure';
}
