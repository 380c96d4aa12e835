/**
 * Conversion Pipeline
 *
 * Drives a whole run:
 * 1. Phase 1: every CUE sheet under the source root is resolved to its
 *    audio image, split into tracks and converted as one bounded batch.
 * 2. Phase 2: remaining .flac/.ape files (those not claimed by a sheet)
 *    are converted as one bounded batch.
 * 3. The shared counters are summarised.
 *
 * Failures are recorded at the narrowest scope (sheet, track or file) and
 * the run continues. Only an unusable output root or work directory ends
 * the run, with a FileSystemError.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { APP_NAME } from '../../shared/types';
import type {
  ConversionJob,
  ConversionResult,
  ConverterConfig,
  PipelineReporter,
  RunSummary,
} from '../../shared/types';
import { readSourceTags } from './audioReader';
import type { SourceTagReader } from './audioReader';
import type { ConvertFn } from './converter';
import { CueprintReader, resolveAudioForCue, resolveTrackTags } from './cueResolver';
import type { CueMetadataReader } from './cueResolver';
import { CueError, FileSystemError, isPipelineError } from './errors';
import type { PipelineError } from './errors';
import { runTool } from './externalTools';
import type { ToolRunner } from './externalTools';
import { JobScheduler } from './jobScheduler';
import type { Logger } from './logger';
import { RunCounters } from './runCounters';
import { splitTracks } from './trackSplitter';
import type { SplitTrack } from './trackSplitter';
import {
  canonicalPath,
  claimUniquePath,
  relativeSubdir,
  sanitizeFilename,
  scanForCueSheets,
  scanForLosslessAudio,
} from '../utils/fileScanner';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface PipelineOptions {
  config: ConverterConfig;
  logger?: Logger;
  reporter?: PipelineReporter;
  /** Process runner for ffmpeg/shnsplit/cueprint */
  runner?: ToolRunner;
  /** Worker used by the scheduler (defaults to convertTrack) */
  convert?: ConvertFn;
  /** Builds the CUE metadata reader for one sheet's work directory */
  createReader?: (scratchDir: string) => CueMetadataReader;
  /** Reads embedded tags of standalone files */
  readTags?: SourceTagReader;
  /** Parent of per-sheet work directories (defaults to the OS temp dir) */
  tempRoot?: string;
  /** Base for relative source/output paths (defaults to process.cwd()) */
  cwd?: string;
}

const SILENT_REPORTER: PipelineReporter = {
  info: () => undefined,
  warn: () => undefined,
  success: () => undefined,
  failure: () => undefined,
};

// ─── Naming ──────────────────────────────────────────────────────────────────

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Output name for a CUE track: `NN - <title>.mp3`, or `NN - Track NN.mp3`
 * when the title is empty after sanitizing.
 */
export function trackFileName(trackNumber: number, title: string): string {
  const safeTitle = sanitizeFilename(title);
  const index = pad2(trackNumber);
  return safeTitle ? `${index} - ${safeTitle}.mp3` : `${index} - Track ${index}.mp3`;
}

/**
 * Output name for a standalone file: its sanitized basename with `.mp3`.
 */
export function standaloneFileName(filePath: string): string {
  const baseName = path.basename(filePath, path.extname(filePath));
  return `${sanitizeFilename(baseName) || 'untitled'}.mp3`;
}

// ─── Claim Registry ──────────────────────────────────────────────────────────

/**
 * Audio files already assigned to a CUE sheet, keyed by canonical path.
 */
export class ClaimRegistry {
  private readonly claimed = new Set<string>();

  claim(filePath: string): void {
    this.claimed.add(canonicalPath(filePath));
  }

  isClaimed(filePath: string): boolean {
    return this.claimed.has(canonicalPath(filePath));
  }

  get size(): number {
    return this.claimed.size;
  }
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

export class ConversionPipeline {
  private readonly config: ConverterConfig;
  private readonly logger: Logger | null;
  private readonly reporter: PipelineReporter;
  private readonly runner: ToolRunner;
  private readonly convert: ConvertFn | undefined;
  private readonly createReader: (scratchDir: string) => CueMetadataReader;
  private readonly readTags: SourceTagReader;
  private readonly tempRoot: string;
  private readonly cwd: string;

  private readonly counters = new RunCounters();
  private readonly claims = new ClaimRegistry();
  /** Destinations planned so far in this run */
  private readonly destinations = new Set<string>();

  constructor(options: PipelineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? null;
    this.reporter = options.reporter ?? SILENT_REPORTER;
    this.runner = options.runner ?? runTool;
    this.convert = options.convert;
    this.createReader =
      options.createReader ??
      ((scratchDir: string): CueMetadataReader =>
        new CueprintReader({ scratchDir, runner: this.runner }));
    this.readTags = options.readTags ?? readSourceTags;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Runs both phases and returns the summary.
   *
   * @throws FileSystemError if the output root or a work directory cannot be created
   */
  async run(): Promise<RunSummary> {
    const started = Date.now();
    const sourceRoot = canonicalPath(path.resolve(this.cwd, this.config.sourceDir));
    const outputRoot = await this.prepareOutputRoot();

    this.reporter.info('Scanning for CUE files...');
    const cueSheets = scanForCueSheets(sourceRoot, [outputRoot]);
    if (cueSheets.length > 0) {
      this.reporter.info(`Found ${cueSheets.length} CUE file(s)`);
      for (const cuePath of cueSheets) {
        await this.processCueSheet(cuePath, sourceRoot, outputRoot);
      }
    } else {
      this.reporter.info('No CUE files found');
    }

    this.reporter.info('Scanning for standalone audio files...');
    const audioFiles = scanForLosslessAudio(sourceRoot, [outputRoot]);
    const standalone = audioFiles.filter((file) => !this.claims.isClaimed(file));
    if (standalone.length > 0) {
      this.reporter.info(`Found ${standalone.length} audio file(s)`);
      const jobs = await this.buildStandaloneJobs(standalone, sourceRoot, outputRoot);
      await this.runBatch(jobs);
    } else {
      this.reporter.info('No standalone audio files found');
    }

    const snapshot = this.counters.snapshot();
    this.logger?.info(
      `Run complete: ${snapshot.successCount} converted, ${snapshot.errorCount} failed`,
    );

    return {
      ...snapshot,
      outputDir: outputRoot,
      sheetsFound: cueSheets.length,
      standaloneFiles: standalone.length,
      durationMs: Date.now() - started,
    };
  }

  /**
   * Creates the output root.
   *
   * @throws FileSystemError if it cannot be created
   */
  async prepareOutputRoot(): Promise<string> {
    const outputRoot = path.resolve(this.cwd, this.config.outputDir);
    try {
      await fs.promises.mkdir(outputRoot, { recursive: true });
    } catch (error: unknown) {
      throw new FileSystemError(`Cannot create output directory: ${outputRoot}`, {
        filePath: outputRoot,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return canonicalPath(outputRoot);
  }

  // ─── Phase 1 ─────────────────────────────────────────────────────────────

  /**
   * Resolves, splits and converts one CUE sheet. Sheet-level failures are
   * counted once and do not throw.
   */
  async processCueSheet(cuePath: string, sourceRoot: string, outputRoot: string): Promise<void> {
    const cueName = path.basename(cuePath);
    const sheetKey = `cue:${cuePath}`;

    const audio = await resolveAudioForCue(cuePath);
    if (!audio) {
      this.failSheet(sheetKey, new CueError(`No audio file found for: ${cueName}`, { filePath: cuePath }));
      return;
    }
    this.claims.claim(audio.path);
    this.reporter.info(`Processing CUE: ${cueName}`);

    const workDir = await this.createWorkDir();
    try {
      const reader = this.createReader(workDir);
      const totalTracks = await reader.trackCount(cuePath);
      if (totalTracks === 0) {
        this.failSheet(sheetKey, new CueError(`No tracks found in CUE file: ${cueName}`, { filePath: cuePath }));
        return;
      }

      this.reporter.info(`Splitting audio into ${totalTracks} tracks...`);
      let splits: SplitTrack[];
      try {
        splits = await splitTracks(cuePath, audio, totalTracks, workDir, { runner: this.runner });
      } catch (error: unknown) {
        if (!isPipelineError(error)) throw error;
        this.failSheet(sheetKey, error, `Failed to split audio file for ${cueName}: ${error.message}`);
        return;
      }

      const outputDir = path.join(outputRoot, relativeSubdir(sourceRoot, cuePath));
      const jobs: ConversionJob[] = [];
      for (const split of splits) {
        if (!split.filePath) {
          const reason = `Track ${split.trackNumber} not found, skipping`;
          this.reporter.warn(reason);
          this.logger?.logSkipped(cuePath, reason, 'splitting');
          this.counters.recordError(`${cuePath}#${split.trackNumber}`, `${cueName}: ${reason}`);
          continue;
        }

        const tags = await resolveTrackTags(
          { artist: this.config.artist, album: this.config.album },
          reader,
          cuePath,
          split.trackNumber,
        );
        const destination = claimUniquePath(
          path.join(outputDir, trackFileName(split.trackNumber, tags.title)),
          this.destinations,
        );
        jobs.push({
          id: destination,
          sourcePath: split.filePath,
          destinationPath: destination,
          artist: tags.artist || undefined,
          album: tags.album || undefined,
          title: tags.title || undefined,
          genre: this.config.genre ?? undefined,
          disc: this.config.disc ?? undefined,
          trackNumber: split.trackNumber,
          totalTracks,
        });
      }

      if (jobs.length > 0) {
        this.reporter.info(
          `Converting ${jobs.length} tracks to MP3 (using ${this.config.parallelism} parallel jobs)...`,
        );
        await this.runBatch(jobs);
      }
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }

  // ─── Phase 2 ─────────────────────────────────────────────────────────────

  /**
   * One job per unclaimed lossless file, mirroring its folder under the
   * output root. Title and album fall back to the file's own tags.
   */
  async buildStandaloneJobs(
    files: readonly string[],
    sourceRoot: string,
    outputRoot: string,
  ): Promise<ConversionJob[]> {
    const jobs: ConversionJob[] = [];
    for (const file of files) {
      const tags = await this.readTags(file);
      const destination = claimUniquePath(
        path.join(outputRoot, relativeSubdir(sourceRoot, file), standaloneFileName(file)),
        this.destinations,
      );
      jobs.push({
        id: destination,
        sourcePath: file,
        destinationPath: destination,
        artist: this.config.artist,
        album: this.config.album ?? tags?.album ?? undefined,
        title: tags?.title ?? undefined,
        genre: this.config.genre ?? undefined,
        disc: this.config.disc ?? undefined,
      });
    }
    return jobs;
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  private async runBatch(jobs: readonly ConversionJob[]): Promise<ConversionResult[]> {
    const scheduler = new JobScheduler({
      parallelism: this.config.parallelism,
      counters: this.counters,
      convert: this.convert,
      converterOptions: { runner: this.runner, timeoutMs: this.config.jobTimeoutMs },
      logger: this.logger ?? undefined,
      onJobComplete: (result) => {
        const name = path.basename(result.job.destinationPath);
        if (result.status === 'completed') {
          this.reporter.success(name);
        } else {
          this.reporter.failure(`Failed: ${name}`);
        }
      },
    });
    return scheduler.runJobs(jobs);
  }

  private async createWorkDir(): Promise<string> {
    try {
      return await fs.promises.mkdtemp(path.join(this.tempRoot, `${APP_NAME}-`));
    } catch (error: unknown) {
      throw new FileSystemError(`Cannot create working directory in ${this.tempRoot}`, {
        filePath: this.tempRoot,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private failSheet(key: string, error: PipelineError, reason: string = error.message): void {
    this.reporter.failure(reason);
    this.logger?.logPipelineError(error);
    this.counters.recordError(key, reason);
  }
}
