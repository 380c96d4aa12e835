/**
 * File Scanner Utility
 *
 * Recursively scans directories for CUE sheets and lossless audio, and
 * builds filesystem-safe output names.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CUE_EXTENSION, LOSSLESS_EXTENSIONS } from '../../shared/types';

/**
 * Checks if a file has one of the given extensions (case-insensitive).
 * @param filePath - Path to the file
 * @param extensions - Extensions with dot prefix
 */
export function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return extensions.includes(ext);
}

/**
 * Recursively scans a directory for files with the given extensions.
 * Unreadable directories are skipped.
 *
 * @param dirPath - Path to the directory to scan
 * @param extensions - Extensions with dot prefix
 * @param excludeDirs - Absolute directories not to descend into
 * @returns Sorted absolute paths of matching files
 */
export function scanDirectory(
  dirPath: string,
  extensions: readonly string[],
  excludeDirs: readonly string[] = [],
): string[] {
  const found: string[] = [];
  const excluded = new Set(excludeDirs.map((dir) => path.resolve(dir)));

  function scanRecursive(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch {
      // Skip directories we can't read (permissions, etc.)
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (!excluded.has(fullPath)) {
          scanRecursive(fullPath);
        }
      } else if (entry.isFile() && hasExtension(entry.name, extensions)) {
        found.push(fullPath);
      }
    }
  }

  scanRecursive(path.resolve(dirPath));
  return found.sort();
}

/** Finds every `.cue` file under a directory */
export function scanForCueSheets(dirPath: string, excludeDirs: readonly string[] = []): string[] {
  return scanDirectory(dirPath, [CUE_EXTENSION], excludeDirs);
}

/** Finds every `.flac` / `.ape` file under a directory */
export function scanForLosslessAudio(
  dirPath: string,
  excludeDirs: readonly string[] = [],
): string[] {
  return scanDirectory(dirPath, LOSSLESS_EXTENSIONS, excludeDirs);
}

/**
 * Returns the canonical form of a path: absolute, with symlinks resolved
 * when the file exists.
 */
export function canonicalPath(filePath: string): string {
  const resolved = path.resolve(filePath);
  try {
    return fs.realpathSync(resolved);
  } catch {
    return resolved;
  }
}

/**
 * Directory of `filePath` relative to `rootDir`, or '' for the root itself.
 */
export function relativeSubdir(rootDir: string, filePath: string): string {
  const rel = path.relative(rootDir, path.dirname(filePath));
  return rel === '.' ? '' : rel;
}

/**
 * Sanitizes a metadata string for use as a filename on common filesystems.
 *
 * `< > : " | ? *` and path separators become `_`, whitespace control
 * characters become spaces, other control characters are removed, then
 * whitespace is trimmed and collapsed. Non-ASCII letters are kept as-is.
 * The result is stable under repeated application.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[<>:"|?*]/g, '_')
    .replace(/[/\\]/g, '_')
    .replace(/[\t\n\v\f\r]/g, ' ')
    .replace(/[\u0000-\u001f\u007f-\u009f]/g, '')
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Key under which a destination is claimed. Paths that differ only in
 * letter case or Unicode normalization name the same file on
 * case-insensitive filesystems.
 */
export function destinationKey(filePath: string): string {
  return filePath.normalize('NFC').toLowerCase();
}

/**
 * Returns `desiredPath`, or a variant with ` (1)`, ` (2)`, ... appended
 * before the extension if the path is already taken, compared by
 * destinationKey. The chosen path keeps its casing; its key is added to
 * `taken`.
 */
export function claimUniquePath(desiredPath: string, taken: Set<string>): string {
  if (!taken.has(destinationKey(desiredPath))) {
    taken.add(destinationKey(desiredPath));
    return desiredPath;
  }

  const dir = path.dirname(desiredPath);
  const ext = path.extname(desiredPath);
  const baseName = path.basename(desiredPath, ext);

  let counter = 1;
  let candidatePath: string;

  do {
    candidatePath = path.join(dir, `${baseName} (${counter})${ext}`);
    counter++;
  } while (taken.has(destinationKey(candidatePath)));

  taken.add(destinationKey(candidatePath));
  return candidatePath;
}
