/**
 * Custom Error Classes for the Conversion Pipeline
 *
 * Provides categorized error types for each scope of failure,
 * so callers can tell run-fatal conditions from per-sheet and per-track ones.
 */

/**
 * Error categories matching the pipeline stages.
 */
export type ErrorCategory =
  | 'ConfigError'
  | 'DependencyError'
  | 'FileSystemError'
  | 'CueError'
  | 'SplitError'
  | 'EncodeError'
  | 'ToolError';

/** Categories that abort the whole run */
const FATAL_CATEGORIES: ReadonlySet<ErrorCategory> = new Set<ErrorCategory>([
  'ConfigError',
  'DependencyError',
  'FileSystemError',
]);

/** Context accepted by every error constructor */
export interface ErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all pipeline errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The file being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The processing step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  readonly cause: Error | null;

  constructor(message: string, category: ErrorCategory, options?: ErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Whether this error must terminate the run */
  get fatal(): boolean {
    return FATAL_CATEGORIES.has(this.category);
  }
}

/**
 * Invalid or missing configuration, e.g. no artist or an unreadable config file.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ConfigError', { step: 'configuration', ...options });
  }
}

/**
 * One or more required external tools are not installed.
 */
export class DependencyError extends PipelineError {
  /** Names of the missing executables */
  readonly missing: string[];

  constructor(message: string, missing: string[], options?: ErrorOptions) {
    super(message, 'DependencyError', { step: 'dependencies', ...options });
    this.missing = [...missing];
  }
}

/**
 * The output root or a working directory could not be created.
 */
export class FileSystemError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FileSystemError', { step: 'filesystem', ...options });
  }
}

/**
 * A CUE sheet could not be used: no audio found, or no tracks.
 */
export class CueError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CueError', { step: 'resolving', ...options });
  }
}

/**
 * Decoding or splitting the album image failed.
 */
export class SplitError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SplitError', { step: 'splitting', ...options });
  }
}

/**
 * Encoding a single track or file to MP3 failed.
 */
export class EncodeError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'EncodeError', { step: 'encoding', ...options });
  }
}

/**
 * An external process exited abnormally or could not be started.
 */
export class ToolError extends PipelineError {
  /** Executable that was run */
  readonly tool: string;
  /** Exit code, or null when the process never ran or was killed */
  readonly exitCode: number | null;
  /** Captured standard error */
  readonly stderr: string;

  constructor(
    message: string,
    details: { tool: string; exitCode?: number | null; stderr?: string },
    options?: ErrorOptions,
  ) {
    super(message, 'ToolError', { step: details.tool, ...options });
    this.tool = details.tool;
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * True when the error belongs to a category that ends the run.
 */
export function isFatalError(error: unknown): boolean {
  return isPipelineError(error) && error.fatal;
}

/**
 * Extracts a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
