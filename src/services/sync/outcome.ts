/**
 * Run outcome accumulation
 */

import type { FailureStage, RecordFailure, RunOutcome } from "../../types/index.js";

export class OutcomeRecorder {
  private processed = 0;
  private succeeded = 0;
  private readonly failures: RecordFailure[] = [];

  success(): void {
    this.processed += 1;
    this.succeeded += 1;
  }

  failure(record: string, row: number, stage: FailureStage, reason: string): void {
    this.processed += 1;
    this.failures.push({ record, row, stage, reason });
  }

  get failureCount(): number {
    return this.failures.length;
  }

  toOutcome(): RunOutcome {
    return {
      processed: this.processed,
      succeeded: this.succeeded,
      failures: [...this.failures],
    };
  }
}

/**
 * Process exit status for a finished run: 0 only when nothing failed
 */
export function exitCodeFor(outcome: RunOutcome): 0 | 1 {
  return outcome.failures.length === 0 ? 0 : 1;
}
