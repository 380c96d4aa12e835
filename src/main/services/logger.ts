/**
 * Logger Service for the Conversion Pipeline
 *
 * Structured logging with file output, log levels, error categorization,
 * and integration with PipelineError classes. Writes daily log files with
 * size rotation.
 *
 * Log levels: ERROR (failed sheets/tracks), WARN (skipped tracks), INFO (progress)
 *
 * Default log directory: %APPDATA%/lossless2mp3/logs/ or ~/.config/lossless2mp3/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { APP_NAME } from '../../shared/types';
import { errorMessage } from './errors';
import type { PipelineError } from './errors';
import type { ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log severity level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** File being processed when the log was created (if applicable) */
  filePath: string | null;
  /** Pipeline step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Context fields accepted by the logging methods */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to the platform config dir */
  logDir?: string;
  /** Minimum log level to write (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

// ─── Constants ───────────────────────────────────────────────────────────

const LOG_DIR_NAME = 'logs';

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Log level numeric values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path based on the platform.
 * On Windows: %APPDATA%/lossless2mp3/logs/
 * On other platforms: ~/.config/lossless2mp3/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single-line string for file output.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.filePath) {
    parts.push(`| filePath: ${entry.filePath}`);
  }

  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }

  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    filePath: error.filePath,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    filePath: options?.filePath ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for the conversion pipeline.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.warn('Track 3 not found, skipping', { filePath: '/music/album.cue', step: 'splitting' });
 * logger.logPipelineError(new CueError('No audio file found', { filePath: '/music/album.cue' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;

  private initialized = false;

  /** Set once the log directory or file fails; later entries are dropped */
  private fileError: string | null = null;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is disabled and the reason is kept for getFileError().
   */
  async initialize(): Promise<void> {
    this.initialized = true;
    if (!this.writeToFile) return;

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.fileError = `Failed to create log directory "${this.logDir}": ${errorMessage(error)}. File logging disabled.`;
    }
  }

  /**
   * Returns the current log file path based on today's date.
   */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  /** Whether entries are currently being persisted to disk */
  isWritingToFile(): boolean {
    return this.writeToFile && this.initialized && this.fileError === null;
  }

  /** Why file logging was turned off, or null */
  getFileError(): string | null {
    return this.fileError;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  /**
   * Logs a PipelineError with full context.
   * Category, filePath, step and cause are taken from the error.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs a skipped track or file (WARN level).
   */
  logSkipped(filePath: string, reason: string, step: string = 'processing'): void {
    this.warn(`Skipped: ${reason}`, { filePath, step });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    if (this.isWritingToFile()) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends a log entry to the current log file, rotating first if the
   * file exceeds maxFileSize. A failed write turns file logging off for
   * the rest of the run.
   */
  private writeEntryToFile(entry: LogEntry): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.fileError = `Failed to write log file "${logFilePath}": ${errorMessage(error)}. File logging disabled.`;
    }
  }

  /**
   * Rotates a log file by renaming it with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }
}
