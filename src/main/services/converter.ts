/**
 * Conversion Worker
 *
 * Encodes one audio segment (a split track or a standalone file) to MP3
 * with ffmpeg, embedding whatever tags the job carries. Each call records
 * exactly one outcome in the run counters.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MP3_QUALITY } from '../../shared/types';
import type { ConversionJob, ConversionResult } from '../../shared/types';
import { EncodeError, errorMessage } from './errors';
import { runTool } from './externalTools';
import type { ToolRunner } from './externalTools';
import type { Logger } from './logger';
import type { RunCounters } from './runCounters';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface ConverterOptions {
  runner?: ToolRunner;
  ffmpegPath?: string;
  /** Kill the encoder after this many ms (0 = no limit) */
  timeoutMs?: number;
  logger?: Logger;
}

/** Signature shared by convertTrack and test doubles */
export type ConvertFn = (
  job: ConversionJob,
  counters: RunCounters,
  options?: ConverterOptions,
) => Promise<ConversionResult>;

// ─── Encoder Arguments ───────────────────────────────────────────────────────

/**
 * Builds the `-metadata key=value` pairs for a job. Empty values are left
 * out; `track` is written as `n/total` only when both are known.
 */
export function buildMetadataTags(job: ConversionJob): Array<[string, string]> {
  const tags: Array<[string, string]> = [];
  const add = (key: string, value: string | undefined): void => {
    if (value) tags.push([key, value]);
  };

  add('artist', job.artist);
  add('album', job.album);
  add('title', job.title);
  add('genre', job.genre);
  add('disc', job.disc);

  if (job.trackNumber !== undefined && job.totalTracks !== undefined) {
    tags.push(['track', `${job.trackNumber}/${job.totalTracks}`]);
  }

  return tags;
}

/**
 * Full ffmpeg argument list for a job: overwrite, VBR quality, tags.
 */
export function buildEncoderArgs(job: ConversionJob, quality: string = MP3_QUALITY): string[] {
  const args = [
    '-y',
    '-loglevel',
    'error',
    '-i',
    job.sourcePath,
    '-vn',
    '-codec:a',
    'libmp3lame',
    '-q:a',
    quality,
    '-id3v2_version',
    '3',
  ];

  for (const [key, value] of buildMetadataTags(job)) {
    args.push('-metadata', `${key}=${value}`);
  }

  args.push(job.destinationPath);
  return args;
}

// ─── Conversion ──────────────────────────────────────────────────────────────

/**
 * Converts a single job. Never throws: failures are returned as a result
 * with status 'error'. A partially written destination is left in place.
 */
export const convertTrack: ConvertFn = async (job, counters, options = {}) => {
  const runner = options.runner ?? runTool;
  const started = Date.now();
  const name = path.basename(job.destinationPath);

  try {
    await fs.promises.mkdir(path.dirname(job.destinationPath), { recursive: true });
    await runner(options.ffmpegPath ?? 'ffmpeg', buildEncoderArgs(job), {
      timeoutMs: options.timeoutMs,
    });
  } catch (error: unknown) {
    const wrapped = new EncodeError(`Failed: ${name}: ${errorMessage(error)}`, {
      filePath: job.sourcePath,
      cause: error instanceof Error ? error : undefined,
    });
    options.logger?.logPipelineError(wrapped);
    counters.recordError(job.id, wrapped.message);
    return {
      job,
      status: 'error',
      error: wrapped.message,
      durationMs: Date.now() - started,
    };
  }

  counters.recordSuccess(job.id);
  options.logger?.info(`Converted: ${name}`, { filePath: job.sourcePath, step: 'encoding' });
  return { job, status: 'completed', error: null, durationMs: Date.now() - started };
};
