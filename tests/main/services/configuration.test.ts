import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  validateParallelism,
  validateTimeoutSeconds,
  validateConfig,
  loadConfigFile,
  mergeConfigSources,
} from '../../../src/main/services/configuration';
import { ConfigError } from '../../../src/main/services/errors';

describe('configuration', () => {
  describe('validateParallelism', () => {
    it('should accept numbers and numeric strings', () => {
      expect(validateParallelism(4)).toBe(4);
      expect(validateParallelism('6')).toBe(6);
    });

    it('should clamp zero and negatives to 1', () => {
      expect(validateParallelism(0)).toBe(1);
      expect(validateParallelism('-3')).toBe(1);
    });

    it('should fall back to the default for unusable values', () => {
      expect(validateParallelism('many')).toBe(8);
      expect(validateParallelism(null)).toBe(8);
    });
  });

  describe('validateTimeoutSeconds', () => {
    it('should convert seconds to milliseconds', () => {
      expect(validateTimeoutSeconds(90)).toBe(90000);
      expect(validateTimeoutSeconds('1.5')).toBe(1500);
    });

    it('should disable the timeout for missing or non-positive values', () => {
      expect(validateTimeoutSeconds(undefined)).toBe(0);
      expect(validateTimeoutSeconds(0)).toBe(0);
      expect(validateTimeoutSeconds('soon')).toBe(0);
    });
  });

  describe('validateConfig', () => {
    it('should require an artist', () => {
      expect(() => validateConfig({})).toThrow(ConfigError);
      expect(() => validateConfig({ artist: '   ' })).toThrow(
        'Artist name is required. Use --artist "Artist Name"',
      );
      expect(() => validateConfig(null)).toThrow(ConfigError);
    });

    it('should fill in defaults', () => {
      expect(validateConfig({ artist: 'Band' })).toEqual({
        artist: 'Band',
        album: null,
        genre: null,
        disc: null,
        outputDir: 'MP3_Export',
        sourceDir: '.',
        parallelism: 8,
        jobTimeoutMs: 0,
        logDir: null,
        writeLogFile: true,
      });
    });

    it('should trim strings, accept a numeric disc and treat blanks as unset', () => {
      const config = validateConfig({
        artist: ' Band ',
        album: '',
        disc: 2,
        genre: 'Rock',
        parallelism: '0',
        timeoutSeconds: 60,
        writeLogFile: false,
      });
      expect(config.artist).toBe('Band');
      expect(config.album).toBeNull();
      expect(config.disc).toBe('2');
      expect(config.genre).toBe('Rock');
      expect(config.parallelism).toBe(1);
      expect(config.jobTimeoutMs).toBe(60000);
      expect(config.writeLogFile).toBe(false);
    });
  });

  describe('loadConfigFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read a JSON object', () => {
      const file = path.join(tempDir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ artist: 'Band', parallelism: 2 }));
      expect(loadConfigFile(file)).toEqual({ artist: 'Band', parallelism: 2 });
    });

    it('should reject missing files, invalid JSON and non-objects', () => {
      const invalid = path.join(tempDir, 'invalid.json');
      fs.writeFileSync(invalid, '{ artist: ');
      const list = path.join(tempDir, 'list.json');
      fs.writeFileSync(list, '[1, 2]');

      expect(() => loadConfigFile(path.join(tempDir, 'missing.json'))).toThrow(
        'Cannot read config file',
      );
      expect(() => loadConfigFile(invalid)).toThrow('Config file is not valid JSON');
      expect(() => loadConfigFile(list)).toThrow('Config file must contain a JSON object');
    });
  });

  describe('mergeConfigSources', () => {
    it('should let later sources win and skip undefined values', () => {
      expect(
        mergeConfigSources(
          { artist: 'File Artist', album: 'File Album', parallelism: 2 },
          { artist: 'Flag Artist', album: undefined },
        ),
      ).toEqual({ artist: 'Flag Artist', album: 'File Album', parallelism: 2 });
    });
  });
});
