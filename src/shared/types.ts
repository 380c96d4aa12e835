/**
 * Shared type definitions for the lossless-to-MP3 converter.
 * These interfaces are used across the pipeline services and the CLI.
 */

/** Command name shown in usage and log paths */
export const APP_NAME = 'lossless2mp3';

/** Version reported by `--version` */
export const APP_VERSION = '2.1.0';

/** Extensions picked up as standalone sources (with dot prefix) */
export const LOSSLESS_EXTENSIONS: readonly string[] = ['.flac', '.ape'] as const;

/** CUE sheet extension */
export const CUE_EXTENSION = '.cue';

/** Sibling audio extensions checked for a CUE sheet, in priority order */
export const CUE_AUDIO_EXTENSIONS: readonly string[] = ['flac', 'ape', 'wav'] as const;

/** LAME VBR quality passed to the encoder (0 = best, ~245 kbps) */
export const MP3_QUALITY = '0';

/** A lossless audio file found on disk */
export interface AudioSource {
  /** Canonical absolute path */
  path: string;
  /** Lowercase extension without the dot (flac, ape, wav, ...) */
  extension: string;
}

/** Field selectors understood by the CUE metadata reader */
export type CueField = 'title' | 'performer';

/** One unit of conversion work */
export interface ConversionJob {
  /** Unique key for the job (the destination path) */
  id: string;
  /** Audio segment to encode */
  sourcePath: string;
  /** MP3 file to write */
  destinationPath: string;
  artist?: string;
  album?: string;
  title?: string;
  genre?: string;
  disc?: string;
  /** 1-based track index (CUE tracks only) */
  trackNumber?: number;
  /** Total tracks on the sheet (CUE tracks only) */
  totalTracks?: number;
}

/** Outcome status of a single job */
export type JobStatus = 'completed' | 'error';

/** Result of converting one job */
export interface ConversionResult {
  job: ConversionJob;
  status: JobStatus;
  /** Error message if status is 'error' */
  error: string | null;
  /** Wall-clock time spent in the encoder */
  durationMs: number;
}

/** A recorded failure, keyed by job id, sheet or track */
export interface FailureRecord {
  key: string;
  reason: string;
}

/** Snapshot of run counters */
export interface CounterSnapshot {
  successCount: number;
  errorCount: number;
  failures: FailureRecord[];
}

/** Summary reported at the end of a run */
export interface RunSummary extends CounterSnapshot {
  /** Absolute output root */
  outputDir: string;
  /** Number of CUE sheets discovered */
  sheetsFound: number;
  /** Number of standalone files converted (after dedup) */
  standaloneFiles: number;
  /** Total run time */
  durationMs: number;
}

/** Converter configuration, immutable once validated */
export interface ConverterConfig {
  /** Artist tag (required) */
  artist: string;
  /** Album tag; falls back to CUE disc title or file tags */
  album: string | null;
  /** Genre tag */
  genre: string | null;
  /** Disc number tag */
  disc: string | null;
  /** Output root directory */
  outputDir: string;
  /** Directory scanned for sources */
  sourceDir: string;
  /** Maximum concurrent conversions */
  parallelism: number;
  /** Per-conversion timeout in ms (0 = none) */
  jobTimeoutMs: number;
  /** Log directory (null = platform default) */
  logDir: string | null;
  /** Whether to write the daily log file */
  writeLogFile: boolean;
}

/** Default configuration values; `artist` has no usable default */
export const DEFAULT_CONFIG: Readonly<Omit<ConverterConfig, 'artist'>> = {
  album: null,
  genre: null,
  disc: null,
  outputDir: 'MP3_Export',
  sourceDir: '.',
  parallelism: 8,
  jobTimeoutMs: 0,
  logDir: null,
  writeLogFile: true,
};

/** Terminal-facing progress sink */
export interface PipelineReporter {
  info(message: string): void;
  warn(message: string): void;
  success(message: string): void;
  failure(message: string): void;
}
