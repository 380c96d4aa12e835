import chalk from 'chalk';
import { describe, it, expect, beforeAll } from 'vitest';
import { ConsoleReporter } from '../../../src/main/utils/consoleReporter';

describe('ConsoleReporter', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should prefix each kind of line', () => {
    const lines: string[] = [];
    const reporter = new ConsoleReporter((line) => lines.push(line));

    reporter.info('Scanning for CUE files...');
    reporter.warn('Track 2 not found, skipping');
    reporter.success('01 - Intro.mp3');
    reporter.failure('Failed: 02 - Track 02.mp3');

    expect(lines).toEqual([
      'Scanning for CUE files...',
      'WARNING: Track 2 not found, skipping',
      '✓ 01 - Intro.mp3',
      '✗ Failed: 02 - Track 02.mp3',
    ]);
  });

  it('should color lines when colors are enabled', () => {
    const lines: string[] = [];
    const reporter = new ConsoleReporter((line) => lines.push(line));
    const previous = chalk.level;
    chalk.level = 1;
    try {
      reporter.failure('boom');
    } finally {
      chalk.level = previous;
    }
    expect(lines[0]).toBe('\u001b[31m✗ boom\u001b[39m');
  });
});
