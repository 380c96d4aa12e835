/**
 * CUE Resolver Service
 *
 * Pairs a CUE sheet with the audio image it describes and extracts
 * per-track and per-disc metadata through cueprint. Metadata lookups never
 * throw: a failed lookup yields an empty value so the tag is simply omitted.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CUE_AUDIO_EXTENSIONS } from '../../shared/types';
import type { AudioSource, CueField } from '../../shared/types';
import { decodeCueBytes, decodeCueText } from './cueText';
import { runTool } from './externalTools';
import type { ToolRunner } from './externalTools';
import { canonicalPath } from '../utils/fileScanner';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/**
 * Source of CUE metadata. Index 0 addresses disc-level fields.
 */
export interface CueMetadataReader {
  /** Number of tracks on the sheet, 0 if it cannot be determined */
  trackCount(cuePath: string): Promise<number>;
  /** One field for one track (or the disc at index 0), '' if unavailable */
  trackMetadata(cuePath: string, trackIndex: number, field: CueField): Promise<string>;
}

/** Options for the cueprint-backed reader */
export interface CueprintReaderOptions {
  /** Directory for the UTF-8 copies handed to cueprint */
  scratchDir: string;
  /** Process runner (defaults to execFile) */
  runner?: ToolRunner;
  /** Path to the cueprint binary */
  cueprintPath?: string;
}

/** Tags resolved for one CUE track */
export interface TrackTags {
  title: string;
  artist: string;
  album: string;
}

/** Values from configuration that win over CUE contents */
export interface TagOverrides {
  artist?: string | null;
  album?: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const FILE_DIRECTIVE = /^\s*FILE\s+"(.*)"\s+(WAVE|APE|FLAC)\b/;

/** cueprint disc-template conversions */
const DISC_TEMPLATES: Record<CueField, string> = {
  title: '%T',
  performer: '%P',
};

/** cueprint track-template conversions */
const TRACK_TEMPLATES: Record<CueField, string> = {
  title: '%t',
  performer: '%p',
};

// ─── Audio Resolution ────────────────────────────────────────────────────────

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function toAudioSource(filePath: string): AudioSource {
  return {
    path: canonicalPath(filePath),
    extension: path.extname(filePath).slice(1).toLowerCase(),
  };
}

/**
 * Returns the file name from the first `FILE "<name>" WAVE|APE|FLAC` line.
 */
export function parseFileDirective(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const match = FILE_DIRECTIVE.exec(line);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Finds the audio image for a CUE sheet.
 *
 * Same-basename siblings win (flac, then ape, then wav). Otherwise the
 * sheet's FILE directive is used, relative to the sheet's directory unless
 * absolute.
 *
 * @returns The audio source, or null if nothing exists on disk
 */
export async function resolveAudioForCue(cuePath: string): Promise<AudioSource | null> {
  const cueDir = path.dirname(cuePath);
  const baseName = path.basename(cuePath, path.extname(cuePath));

  for (const ext of CUE_AUDIO_EXTENSIONS) {
    const candidate = path.join(cueDir, `${baseName}.${ext}`);
    if (await isFile(candidate)) {
      return toAudioSource(candidate);
    }
  }

  let reference: string | null;
  try {
    reference = parseFileDirective((await decodeCueText(cuePath)).text);
  } catch {
    return null;
  }
  if (!reference) {
    return null;
  }

  const candidates = [path.isAbsolute(reference) ? reference : path.join(cueDir, reference)];
  // Sheets written on Windows often use backslash separators
  if (reference.includes('\\') && path.sep === '/') {
    const normalized = reference.replace(/\\/g, '/');
    candidates.push(path.isAbsolute(normalized) ? normalized : path.join(cueDir, normalized));
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return toAudioSource(candidate);
    }
  }
  return null;
}

// ─── Metadata Extraction ─────────────────────────────────────────────────────

/**
 * CueMetadataReader backed by the cueprint tool.
 *
 * cueprint misreads sheets in legacy code pages, so each sheet is decoded
 * once and written as UTF-8 into `scratchDir`; cueprint reads that copy.
 * Results are cached per sheet, track and field.
 */
export class CueprintReader implements CueMetadataReader {
  private readonly scratchDir: string;
  private readonly runner: ToolRunner;
  private readonly cueprintPath: string;
  private readonly copies = new Map<string, Promise<string>>();
  private readonly fieldCache = new Map<string, Promise<string>>();

  constructor(options: CueprintReaderOptions) {
    this.scratchDir = options.scratchDir;
    this.runner = options.runner ?? runTool;
    this.cueprintPath = options.cueprintPath ?? 'cueprint';
  }

  async trackCount(cuePath: string): Promise<number> {
    try {
      const sheet = await this.utf8Copy(cuePath);
      const { stdout } = await this.runner(this.cueprintPath, ['-d', '%N', sheet]);
      const count = Number.parseInt(stdout.trim(), 10);
      return Number.isInteger(count) && count > 0 ? count : 0;
    } catch {
      return 0;
    }
  }

  trackMetadata(cuePath: string, trackIndex: number, field: CueField): Promise<string> {
    if (!Number.isInteger(trackIndex) || trackIndex < 0) {
      return Promise.resolve('');
    }

    const key = `${cuePath}\0${trackIndex}\0${field}`;
    let pending = this.fieldCache.get(key);
    if (!pending) {
      pending = this.queryField(cuePath, trackIndex, field);
      this.fieldCache.set(key, pending);
    }
    return pending;
  }

  private async queryField(cuePath: string, trackIndex: number, field: CueField): Promise<string> {
    try {
      const sheet = await this.utf8Copy(cuePath);
      const args =
        trackIndex === 0
          ? ['-d', DISC_TEMPLATES[field], sheet]
          : ['-n', String(trackIndex), '-t', TRACK_TEMPLATES[field], sheet];
      const { stdout } = await this.runner(this.cueprintPath, args);
      return stdout.trim();
    } catch {
      return '';
    }
  }

  /**
   * Path of a UTF-8 copy of the sheet. Falls back to the original path if
   * the copy cannot be made.
   */
  private utf8Copy(cuePath: string): Promise<string> {
    let pending = this.copies.get(cuePath);
    if (!pending) {
      const target = path.join(this.scratchDir, `sheet-${this.copies.size + 1}.cue`);
      pending = fs.promises
        .readFile(cuePath)
        .then((bytes) => fs.promises.writeFile(target, decodeCueBytes(bytes).text, 'utf-8'))
        .then(
          () => target,
          () => cuePath,
        );
      this.copies.set(cuePath, pending);
    }
    return pending;
  }
}

/**
 * Resolves the tags for one CUE track.
 *
 * Configured artist/album win. Otherwise the artist is the track performer,
 * then the disc performer; the album is the disc title. CUE fields are only
 * read when they can affect the result.
 */
export async function resolveTrackTags(
  overrides: TagOverrides,
  reader: CueMetadataReader,
  cuePath: string,
  trackIndex: number,
): Promise<TrackTags> {
  const title = await reader.trackMetadata(cuePath, trackIndex, 'title');

  let artist = overrides.artist ?? '';
  if (!artist) {
    artist = await reader.trackMetadata(cuePath, trackIndex, 'performer');
    if (!artist) {
      artist = await reader.trackMetadata(cuePath, 0, 'performer');
    }
  }

  let album = overrides.album ?? '';
  if (!album) {
    album = await reader.trackMetadata(cuePath, 0, 'title');
  }

  return { title, artist, album };
}
