/**
 * Run Counters
 *
 * Success/error tallies shared by every worker in a run. The object is
 * created by the pipeline and handed to the scheduler and workers; it is
 * only mutated through `recordSuccess` / `recordError`, and every outcome
 * key counts once.
 */

import type { CounterSnapshot, FailureRecord } from '../../shared/types';

export class RunCounters {
  private successCount = 0;
  private errorCount = 0;
  private readonly failures: FailureRecord[] = [];
  private readonly recorded = new Set<string>();

  /**
   * Counts a success for `key`.
   * @returns false if `key` already has an outcome (nothing is counted)
   */
  recordSuccess(key: string): boolean {
    if (!this.claim(key)) return false;
    this.successCount++;
    return true;
  }

  /**
   * Counts an error for `key` and keeps the reason for the summary.
   * @returns false if `key` already has an outcome (nothing is counted)
   */
  recordError(key: string, reason: string): boolean {
    if (!this.claim(key)) return false;
    this.errorCount++;
    this.failures.push({ key, reason });
    return true;
  }

  /** Whether an outcome has been recorded for `key` */
  has(key: string): boolean {
    return this.recorded.has(key);
  }

  get successes(): number {
    return this.successCount;
  }

  get errors(): number {
    return this.errorCount;
  }

  /** Total recorded outcomes */
  get total(): number {
    return this.successCount + this.errorCount;
  }

  snapshot(): CounterSnapshot {
    return {
      successCount: this.successCount,
      errorCount: this.errorCount,
      failures: this.failures.map((f) => ({ ...f })),
    };
  }

  private claim(key: string): boolean {
    if (this.recorded.has(key)) return false;
    this.recorded.add(key);
    return true;
  }
}
