/**
 * Audio Reader Service
 *
 * Reads the embedded tags of standalone lossless files with music-metadata,
 * so a converted file keeps its own title/album when the configuration does
 * not supply one.
 */

import * as mm from 'music-metadata';

/** Tags of interest from a source file */
export interface SourceTags {
  title: string | null;
  artist: string | null;
  album: string | null;
}

/** Reader signature, injectable for tests */
export type SourceTagReader = (filePath: string) => Promise<SourceTags | null>;

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Maps music-metadata's common tags to SourceTags.
 */
export function mapCommonTags(
  common: Pick<mm.ICommonTagsResult, 'title' | 'artist' | 'album'>,
): SourceTags {
  return {
    title: nonEmpty(common.title),
    artist: nonEmpty(common.artist),
    album: nonEmpty(common.album),
  };
}

/**
 * Reads the tags of an audio file.
 *
 * @returns The tags, or null if the file cannot be parsed
 */
export const readSourceTags: SourceTagReader = async (filePath) => {
  try {
    const metadata = await mm.parseFile(filePath, {
      duration: false,
      skipCovers: true,
    });
    return mapCommonTags(metadata.common);
  } catch {
    return null;
  }
};
