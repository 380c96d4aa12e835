/**
 * Tests for the Conversion Pipeline
 *
 * External tools are replaced by an in-process runner that writes the files
 * ffmpeg and shnsplit would produce, and CUE metadata comes from an
 * in-memory reader, so every scenario runs against a real temp directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConversionPipeline,
  ClaimRegistry,
  trackFileName,
  standaloneFileName,
} from '../../../src/main/services/pipeline';
import type { PipelineOptions } from '../../../src/main/services/pipeline';
import type { CueMetadataReader } from '../../../src/main/services/cueResolver';
import type { ToolRunner } from '../../../src/main/services/externalTools';
import { ToolError, FileSystemError, SplitError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';
import { validateConfig } from '../../../src/main/services/configuration';
import type { CueField, PipelineReporter } from '../../../src/shared/types';

// ─── Test Helpers ────────────────────────────────────────────────────────

interface ToolCall {
  command: string;
  args: readonly string[];
}

interface FakeSheet {
  trackCount: number;
  /** Track numbers shnsplit actually writes (defaults to all) */
  produced?: number[];
  /** Metadata keyed by `${index}:${field}` */
  fields?: Record<string, string>;
}

/** Reporter that keeps every line, prefixed with its kind */
function recordingReporter(): PipelineReporter & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (m) => lines.push(`info: ${m}`),
    warn: (m) => lines.push(`warn: ${m}`),
    success: (m) => lines.push(`success: ${m}`),
    failure: (m) => lines.push(`failure: ${m}`),
  };
}

describe('ConversionPipeline', () => {
  let tempDir: string;
  let musicDir: string;
  let outDir: string;
  let scratchRoot: string;
  let sheets: Record<string, FakeSheet>;
  let calls: ToolCall[];
  let failEncodeFor: Set<string>;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-test-')));
    musicDir = path.join(tempDir, 'music');
    outDir = path.join(tempDir, 'out');
    scratchRoot = path.join(tempDir, 'tmp');
    fs.mkdirSync(musicDir);
    fs.mkdirSync(scratchRoot);
    sheets = {};
    calls = [];
    failEncodeFor = new Set();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function write(relative: string, content = ''): string {
    const fullPath = path.join(musicDir, relative);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
  }

  /** Looks a sheet up by the basename of its CUE path */
  function sheetFor(cuePath: string): FakeSheet {
    return sheets[path.basename(cuePath)] ?? { trackCount: 0 };
  }

  const runner: ToolRunner = async (command, args) => {
    calls.push({ command, args });
    if (command === 'shnsplit') {
      const splitDir = args[args.indexOf('-d') + 1];
      const sheet = sheetFor(args[args.indexOf('-f') + 1]);
      const produced =
        sheet.produced ?? Array.from({ length: sheet.trackCount }, (_, i) => i + 1);
      for (const n of produced) {
        fs.writeFileSync(path.join(splitDir, `${String(n).padStart(2, '0')}.wav`), 'pcm');
      }
    }
    if (command === 'ffmpeg') {
      const output = args[args.length - 1];
      if (failEncodeFor.has(path.basename(output))) {
        throw new ToolError('ffmpeg exited with code 1', { tool: 'ffmpeg', exitCode: 1 });
      }
      fs.writeFileSync(output, 'mp3');
    }
    return { stdout: '', stderr: '' };
  };

  const createReader = (): CueMetadataReader => ({
    trackCount: async (cuePath) => sheetFor(cuePath).trackCount,
    trackMetadata: async (cuePath: string, index: number, field: CueField) =>
      sheetFor(cuePath).fields?.[`${index}:${field}`] ?? '',
  });

  function makePipeline(overrides: Partial<PipelineOptions> = {}): ConversionPipeline {
    return new ConversionPipeline({
      config: validateConfig({
        artist: 'Band',
        sourceDir: 'music',
        outputDir: 'out',
        parallelism: 2,
      }),
      runner,
      createReader,
      readTags: async () => null,
      tempRoot: scratchRoot,
      cwd: tempDir,
      ...overrides,
    });
  }

  /** Metadata arguments ffmpeg received for one output file */
  function metadataFor(outputName: string): string[] {
    const call = calls.find(
      (c) => c.command === 'ffmpeg' && path.basename(c.args[c.args.length - 1]) === outputName,
    );
    if (!call) return [];
    return call.args.filter((_, i) => i > 0 && call.args[i - 1] === '-metadata');
  }

  function listOutputs(): string[] {
    const found: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) walk(full);
        else found.push(path.relative(outDir, full));
      }
    };
    walk(outDir);
    return found.sort();
  }

  // ─── Naming ───────────────────────────────────────────────────────

  describe('trackFileName / standaloneFileName', () => {
    it('should number tracks and fall back to "Track NN" for empty titles', () => {
      expect(trackFileName(1, 'Intro')).toBe('01 - Intro.mp3');
      expect(trackFileName(2, '')).toBe('02 - Track 02.mp3');
      expect(trackFileName(3, ' / ')).toBe('03 - _.mp3');
      expect(trackFileName(4, ' \t ')).toBe('04 - Track 04.mp3');
      expect(trackFileName(12, 'What?')).toBe('12 - What_.mp3');
    });

    it('should sanitize standalone basenames', () => {
      expect(standaloneFileName('/m/Song: Live.flac')).toBe('Song_ Live.mp3');
      expect(standaloneFileName('/m/  .ape')).toBe('untitled.mp3');
    });
  });

  describe('ClaimRegistry', () => {
    it('should match claims by canonical path', () => {
      const image = write('Album/Album.flac');
      const registry = new ClaimRegistry();
      registry.claim(path.join(musicDir, 'Album', '..', 'Album', 'Album.flac'));

      expect(registry.isClaimed(image)).toBe(true);
      expect(registry.isClaimed(path.join(musicDir, 'other.flac'))).toBe(false);
      expect(registry.size).toBe(1);
    });
  });

  // ─── Phase 1 ──────────────────────────────────────────────────────

  describe('CUE sheets', () => {
    it('should split and convert every track with CUE titles and fallbacks', async () => {
      write('Album/Album.cue', 'FILE "Album.flac" WAVE\n');
      write('Album/Album.flac');
      sheets['Album.cue'] = {
        trackCount: 3,
        fields: { '1:title': 'Intro', '3:title': 'Finale', '0:title': 'Live Record' },
      };
      const reporter = recordingReporter();

      const summary = await makePipeline({ reporter }).run();

      expect(listOutputs()).toEqual([
        path.join('Album', '01 - Intro.mp3'),
        path.join('Album', '02 - Track 02.mp3'),
        path.join('Album', '03 - Finale.mp3'),
      ]);
      expect(summary).toMatchObject({
        successCount: 3,
        errorCount: 0,
        failures: [],
        outputDir: outDir,
        sheetsFound: 1,
        standaloneFiles: 0,
      });
      expect(metadataFor('02 - Track 02.mp3')).toEqual([
        'artist=Band',
        'album=Live Record',
        'track=2/3',
      ]);
      expect(metadataFor('01 - Intro.mp3')).toEqual([
        'artist=Band',
        'album=Live Record',
        'title=Intro',
        'track=1/3',
      ]);
      expect(reporter.lines).toContain('success: 03 - Finale.mp3');
    });

    it('should pass genre and disc from the configuration', async () => {
      write('a.cue');
      write('a.flac');
      sheets['a.cue'] = { trackCount: 1, fields: { '1:title': 'Only' } };
      const config = validateConfig({
        artist: 'Band',
        album: 'Set Album',
        genre: 'Jazz',
        disc: '2',
        sourceDir: 'music',
        outputDir: 'out',
      });

      await makePipeline({ config }).run();

      expect(metadataFor('01 - Only.mp3')).toEqual([
        'artist=Band',
        'album=Set Album',
        'title=Only',
        'genre=Jazz',
        'disc=2',
        'track=1/1',
      ]);
    });

    it('should not convert an image claimed by a sheet as a standalone file', async () => {
      write('a.cue');
      write('a.flac');
      write('b.flac');
      sheets['a.cue'] = { trackCount: 2, fields: { '1:title': 'One', '2:title': 'Two' } };

      const summary = await makePipeline().run();

      expect(listOutputs()).toEqual(['01 - One.mp3', '02 - Two.mp3', 'b.mp3']);
      expect(summary.successCount).toBe(3);
      expect(summary.standaloneFiles).toBe(1);
    });

    it('should count a sheet with a missing FILE reference once and continue', async () => {
      write('sheet.cue', 'FILE "nonexistent.flac" WAVE\n');
      write('x.flac');
      const reporter = recordingReporter();

      const summary = await makePipeline({ reporter }).run();

      expect(summary.errorCount).toBe(1);
      expect(summary.failures).toEqual([
        {
          key: `cue:${path.join(musicDir, 'sheet.cue')}`,
          reason: 'No audio file found for: sheet.cue',
        },
      ]);
      expect(summary.successCount).toBe(1);
      expect(listOutputs()).toEqual(['x.mp3']);
      expect(reporter.lines).toContain('failure: No audio file found for: sheet.cue');
    });

    it('should count a sheet without tracks once and keep its image claimed', async () => {
      write('album.cue');
      write('album.flac');
      sheets['album.cue'] = { trackCount: 0 };

      const summary = await makePipeline().run();

      expect(summary.successCount).toBe(0);
      expect(summary.errorCount).toBe(1);
      expect(summary.failures[0].reason).toBe('No tracks found in CUE file: album.cue');
      expect(calls.some((c) => c.command === 'shnsplit')).toBe(false);
    });

    it('should count each missing split output as one error', async () => {
      write('album.cue');
      write('album.flac');
      sheets['album.cue'] = { trackCount: 3, produced: [1, 3] };
      const logger = new Logger({ writeToFile: false });
      const logSkipped = vi.spyOn(logger, 'logSkipped');

      const summary = await makePipeline({ logger }).run();

      expect(summary.successCount).toBe(2);
      expect(summary.errorCount).toBe(1);
      expect(summary.failures[0]).toEqual({
        key: `${path.join(musicDir, 'album.cue')}#2`,
        reason: 'album.cue: Track 2 not found, skipping',
      });
      expect(logSkipped.mock.calls).toEqual([
        [path.join(musicDir, 'album.cue'), 'Track 2 not found, skipping', 'splitting'],
      ]);
    });

    it('should count a failed split once for the sheet', async () => {
      write('album.cue');
      write('album.flac');
      sheets['album.cue'] = { trackCount: 2 };
      const failingSplit: ToolRunner = async (command, args) => {
        if (command === 'shnsplit') {
          throw new ToolError('shnsplit exited with code 1', { tool: 'shnsplit', exitCode: 1 });
        }
        return runner(command, args);
      };

      const logger = new Logger({ writeToFile: false });
      const logPipelineError = vi.spyOn(logger, 'logPipelineError');

      const summary = await makePipeline({ runner: failingSplit, logger }).run();

      expect(summary.successCount).toBe(0);
      expect(summary.errorCount).toBe(1);
      expect(summary.failures[0].reason).toBe(
        'Failed to split audio file for album.cue: Failed to split album.flac: shnsplit exited with code 1',
      );
      expect(logPipelineError).toHaveBeenCalledTimes(1);
      const [logged] = logPipelineError.mock.calls[0];
      expect(logged).toBeInstanceOf(SplitError);
      expect(logged.step).toBe('splitting');
      expect(logged.filePath).toBe(path.join(musicDir, 'album.cue'));
    });

    it('should decode ape images before splitting', async () => {
      write('disc.cue');
      write('disc.ape');
      sheets['disc.cue'] = { trackCount: 1 };

      const summary = await makePipeline().run();

      expect(calls.map((c) => c.command)).toEqual(['ffmpeg', 'shnsplit', 'ffmpeg']);
      expect(path.basename(calls[0].args[calls[0].args.length - 1])).toBe('source.wav');
      expect(summary.successCount).toBe(1);
      expect(listOutputs()).toEqual(['01 - Track 01.mp3']);
    });

    it('should isolate a failed track encode', async () => {
      write('album.cue');
      write('album.flac');
      sheets['album.cue'] = { trackCount: 3 };
      failEncodeFor.add('02 - Track 02.mp3');

      const summary = await makePipeline().run();

      expect(summary.successCount).toBe(2);
      expect(summary.errorCount).toBe(1);
      expect(summary.failures[0].reason).toBe(
        'Failed: 02 - Track 02.mp3: ffmpeg exited with code 1',
      );
    });

    it('should remove every work directory', async () => {
      write('a.cue');
      write('a.flac');
      write('sub/b.cue');
      write('sub/b.flac');
      sheets['a.cue'] = { trackCount: 1 };
      sheets['b.cue'] = { trackCount: 0 };

      await makePipeline().run();

      expect(fs.readdirSync(scratchRoot)).toEqual([]);
    });
  });

  // ─── Phase 2 ──────────────────────────────────────────────────────

  describe('standalone files', () => {
    it('should mirror folders and use the file tags as fallback', async () => {
      const song = write('Artist/Record/song.FLAC');
      write('Artist/other.ape');

      const summary = await makePipeline({
        readTags: async (file) =>
          file === song ? { title: 'Real Title', artist: 'Ignored', album: 'Tagged Album' } : null,
      }).run();

      expect(listOutputs()).toEqual([
        path.join('Artist', 'Record', 'song.mp3'),
        path.join('Artist', 'other.mp3'),
      ].sort());
      expect(summary.standaloneFiles).toBe(2);
      expect(metadataFor('song.mp3')).toEqual([
        'artist=Band',
        'album=Tagged Album',
        'title=Real Title',
      ]);
      expect(metadataFor('other.mp3')).toEqual(['artist=Band']);
    });

    it('should give colliding sanitized names distinct destinations', async () => {
      write('x?.flac');
      write('x_.flac');

      const summary = await makePipeline().run();

      expect(listOutputs()).toEqual(['x_ (1).mp3', 'x_.mp3']);
      expect(summary.successCount).toBe(2);
    });

    it('should not let names differing only in case share a destination', async () => {
      write('sub/y.ape');
      write('sub/Y.flac');

      const summary = await makePipeline().run();

      expect(listOutputs()).toEqual([path.join('sub', 'Y.mp3'), path.join('sub', 'y (1).mp3')]);
      expect(summary.successCount).toBe(2);
    });

    it('should not rescan an output directory inside the source tree', async () => {
      write('a.flac');
      write('MP3_Export/old.flac');
      const config = validateConfig({ artist: 'Band', sourceDir: 'music', outputDir: 'music/MP3_Export' });

      const summary = await makePipeline({ config }).run();

      expect(summary.standaloneFiles).toBe(1);
    });
  });

  // ─── Fatal Errors ─────────────────────────────────────────────────

  describe('fatal errors', () => {
    it('should throw a FileSystemError when the output root cannot be created', async () => {
      fs.writeFileSync(path.join(tempDir, 'blocker'), 'file');
      const config = validateConfig({ artist: 'Band', sourceDir: 'music', outputDir: 'blocker/out' });

      await expect(makePipeline({ config }).run()).rejects.toBeInstanceOf(FileSystemError);
    });

    it('should return an empty summary for an empty source tree', async () => {
      const reporter = recordingReporter();
      const summary = await makePipeline({ reporter }).run();

      expect(summary).toMatchObject({ successCount: 0, errorCount: 0, sheetsFound: 0 });
      expect(reporter.lines).toContain('info: No CUE files found');
      expect(reporter.lines).toContain('info: No standalone audio files found');
    });
  });
});
