/**
 * Configuration Service
 *
 * Builds the immutable ConverterConfig from an optional JSON config file
 * and command-line values. Validation is schema-by-hand with safe defaults,
 * except for the artist, which has no default and is required.
 */

import * as fs from 'fs';
import { DEFAULT_CONFIG } from '../../shared/types';
import type { ConverterConfig } from '../../shared/types';
import { ConfigError } from './errors';
import { clampParallelism } from './jobScheduler';

// ─── Helper Functions ────────────────────────────────────────────────────────

function optionalString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validates a parallelism value. Numeric strings are accepted; anything
 * unusable falls back to the default, and values below 1 become 1.
 */
export function validateParallelism(value: unknown): number {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric !== 'number' || Number.isNaN(numeric)) {
    return DEFAULT_CONFIG.parallelism;
  }
  return clampParallelism(numeric);
}

/**
 * Validates a timeout given in seconds and returns milliseconds.
 * Missing, negative or non-numeric values mean no timeout.
 */
export function validateTimeoutSeconds(value: unknown): number {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric) || numeric <= 0) {
    return 0;
  }
  return Math.round(numeric * 1000);
}

/**
 * Validates a raw settings object and returns a complete ConverterConfig.
 *
 * Accepted keys: artist, album, genre, disc, outputDir, sourceDir,
 * parallelism, timeoutSeconds, logDir, writeLogFile.
 *
 * @throws ConfigError if the artist is missing
 */
export function validateConfig(raw: unknown): ConverterConfig {
  const input = isRecord(raw) ? raw : {};

  const artist = optionalString(input.artist);
  if (!artist) {
    throw new ConfigError('Artist name is required. Use --artist "Artist Name"');
  }

  return {
    artist,
    album: optionalString(input.album),
    genre: optionalString(input.genre),
    disc: optionalString(input.disc),
    outputDir: optionalString(input.outputDir) ?? DEFAULT_CONFIG.outputDir,
    sourceDir: optionalString(input.sourceDir) ?? DEFAULT_CONFIG.sourceDir,
    parallelism:
      input.parallelism === undefined
        ? DEFAULT_CONFIG.parallelism
        : validateParallelism(input.parallelism),
    jobTimeoutMs: validateTimeoutSeconds(input.timeoutSeconds),
    logDir: optionalString(input.logDir),
    writeLogFile:
      typeof input.writeLogFile === 'boolean' ? input.writeLogFile : DEFAULT_CONFIG.writeLogFile,
  };
}

/**
 * Reads a JSON config file.
 *
 * @throws ConfigError if the file cannot be read, is not JSON, or is not an object
 */
export function loadConfigFile(filePath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, {
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, {
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${filePath}`, { filePath });
  }
  return parsed;
}

/**
 * Merges config sources; later sources win for keys they define.
 * Undefined values do not override.
 */
export function mergeConfigSources(
  ...sources: ReadonlyArray<Record<string, unknown>>
): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}
