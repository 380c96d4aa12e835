/**
 * Job Scheduler with Concurrency Control
 *
 * Runs a batch of conversion jobs on a bounded pool of workers. Workers pull
 * jobs from a shared cursor, so dispatch follows input order while
 * completion order is free. One failing job never stops the others.
 *
 * Key design decisions:
 * - Parallelism is clamped to at least 1 (0, negative or NaN run sequentially)
 * - No cancellation: a dispatched batch always runs to completion
 * - RunCounters is the only shared mutable state
 * - Results come back in input order
 */

import * as path from 'path';
import type { ConversionJob, ConversionResult } from '../../shared/types';
import { convertTrack } from './converter';
import type { ConvertFn, ConverterOptions } from './converter';
import type { Logger } from './logger';
import type { RunCounters } from './runCounters';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface JobSchedulerOptions {
  /** Maximum concurrent conversions (clamped to >= 1) */
  parallelism: number;
  /** Shared outcome counters */
  counters: RunCounters;
  /** Worker implementation (defaults to convertTrack) */
  convert?: ConvertFn;
  /** Passed through to every worker call */
  converterOptions?: ConverterOptions;
  logger?: Logger;
  /** Called when a job is handed to a worker */
  onJobStart?: (job: ConversionJob) => void;
  /** Called when a job finishes, successfully or not */
  onJobComplete?: (result: ConversionResult) => void;
}

/**
 * Validates a parallelism value: anything non-finite or below 1 becomes 1,
 * fractions are truncated.
 */
export function clampParallelism(value: number): number {
  if (!Number.isFinite(value) || value < 1) {
    return 1;
  }
  return Math.floor(value);
}

// ─── Scheduler ───────────────────────────────────────────────────────────────

export class JobScheduler {
  private readonly parallelism: number;
  private readonly counters: RunCounters;
  private readonly convert: ConvertFn;
  private readonly converterOptions: ConverterOptions;
  private readonly logger: Logger | null;
  private readonly onJobStart: ((job: ConversionJob) => void) | null;
  private readonly onJobComplete: ((result: ConversionResult) => void) | null;

  constructor(options: JobSchedulerOptions) {
    this.parallelism = clampParallelism(options.parallelism);
    this.counters = options.counters;
    this.convert = options.convert ?? convertTrack;
    this.logger = options.logger ?? null;
    this.converterOptions = {
      ...options.converterOptions,
      logger: options.converterOptions?.logger ?? options.logger,
    };
    this.onJobStart = options.onJobStart ?? null;
    this.onJobComplete = options.onJobComplete ?? null;
  }

  /**
   * Returns the effective parallelism after clamping.
   */
  getParallelism(): number {
    return this.parallelism;
  }

  /**
   * Converts every job with at most `parallelism` running at once.
   *
   * @returns One result per job, in input order
   */
  async runJobs(jobs: readonly ConversionJob[]): Promise<ConversionResult[]> {
    if (jobs.length === 0) {
      return [];
    }

    this.logger?.info(`Starting batch: ${jobs.length} job(s), parallelism: ${this.parallelism}`);
    const startTime = Date.now();
    const results: ConversionResult[] = new Array<ConversionResult>(jobs.length);

    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < jobs.length) {
        const currentIndex = nextIndex++;
        const job = jobs[currentIndex];
        this.onJobStart?.(job);
        const result = await this.runOne(job);
        results[currentIndex] = result;
        this.onJobComplete?.(result);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.parallelism, jobs.length); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    const failed = results.filter((r) => r.status === 'error').length;
    this.logger?.info(
      `Batch complete: ${results.length - failed} succeeded, ${failed} failed in ${((Date.now() - startTime) / 1000).toFixed(1)}s`,
    );

    return results;
  }

  /**
   * Runs one job. A worker that throws still produces exactly one error
   * outcome for the job.
   */
  private async runOne(job: ConversionJob): Promise<ConversionResult> {
    const started = Date.now();
    try {
      return await this.convert(job, this.counters, this.converterOptions);
    } catch (error: unknown) {
      const message = `Failed: ${path.basename(job.destinationPath)}: ${error instanceof Error ? error.message : String(error)}`;
      this.counters.recordError(job.id, message);
      this.logger?.error(message, { filePath: job.sourcePath, step: 'encoding' });
      return { job, status: 'error', error: message, durationMs: Date.now() - started };
    }
  }
}
