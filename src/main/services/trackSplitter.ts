/**
 * Track Splitter Service
 *
 * Cuts a whole-album audio image into per-track WAV files with shnsplit.
 * APE images are decoded to WAV with ffmpeg first, since shnsplit cannot
 * read them without an external helper.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AudioSource } from '../../shared/types';
import { SplitError, errorMessage } from './errors';
import { runTool } from './externalTools';
import type { ToolRunner } from './externalTools';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** One expected split output */
export interface SplitTrack {
  /** 1-based track index */
  trackNumber: number;
  /** Path of the split file, or null if the splitter did not produce it */
  filePath: string | null;
}

export interface SplitOptions {
  runner?: ToolRunner;
  ffmpegPath?: string;
  shnsplitPath?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

/** Extensions that must be decoded before splitting */
const DECODE_FIRST: ReadonlySet<string> = new Set(['ape']);

const SPLIT_SUBDIR = 'split';
const DECODED_NAME = 'source.wav';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * File name shnsplit writes for a track with the `%n` template.
 */
export function splitFileName(trackNumber: number): string {
  return `${String(trackNumber).padStart(2, '0')}.wav`;
}

/**
 * Decodes an audio file to 16-bit PCM WAV.
 *
 * @throws SplitError if ffmpeg fails
 */
export async function decodeToWav(
  sourcePath: string,
  wavPath: string,
  options: SplitOptions = {},
): Promise<void> {
  const runner = options.runner ?? runTool;
  try {
    await runner(options.ffmpegPath ?? 'ffmpeg', [
      '-y',
      '-loglevel',
      'error',
      '-i',
      sourcePath,
      '-acodec',
      'pcm_s16le',
      wavPath,
    ]);
  } catch (error: unknown) {
    throw new SplitError(`Failed to decode ${path.basename(sourcePath)}: ${errorMessage(error)}`, {
      filePath: sourcePath,
      step: 'decoding',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// ─── Splitting ───────────────────────────────────────────────────────────────

/**
 * Splits `source` at the breakpoints of `cuePath` into `workDir/split`.
 *
 * Tracks are numbered from 1 and named with at least two digits. A track
 * whose file is missing afterwards comes back with `filePath: null`; the
 * caller decides how to account for it. Everything written goes under
 * `workDir`, which the caller removes.
 *
 * @throws SplitError if decoding or splitting fails
 */
export async function splitTracks(
  cuePath: string,
  source: AudioSource,
  totalTracks: number,
  workDir: string,
  options: SplitOptions = {},
): Promise<SplitTrack[]> {
  const runner = options.runner ?? runTool;

  let input = source.path;
  if (DECODE_FIRST.has(source.extension)) {
    input = path.join(workDir, DECODED_NAME);
    await decodeToWav(source.path, input, options);
  }

  const splitDir = path.join(workDir, SPLIT_SUBDIR);
  try {
    await fs.promises.mkdir(splitDir, { recursive: true });
    await runner(options.shnsplitPath ?? 'shnsplit', [
      '-f',
      cuePath,
      '-t',
      '%n',
      '-o',
      'wav',
      '-d',
      splitDir,
      '-O',
      'never',
      input,
    ]);
  } catch (error: unknown) {
    throw new SplitError(`Failed to split ${path.basename(source.path)}: ${errorMessage(error)}`, {
      filePath: cuePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const tracks: SplitTrack[] = [];
  for (let trackNumber = 1; trackNumber <= totalTracks; trackNumber++) {
    const filePath = path.join(splitDir, splitFileName(trackNumber));
    tracks.push({ trackNumber, filePath: fs.existsSync(filePath) ? filePath : null });
  }
  return tracks;
}
