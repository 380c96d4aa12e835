/**
 * Console progress output for the CLI.
 */

import chalk from 'chalk';
import type { PipelineReporter } from '../../shared/types';

/** Where reporter lines go (console.log by default) */
export type WriteLine = (line: string) => void;

export class ConsoleReporter implements PipelineReporter {
  private readonly write: WriteLine;

  constructor(write: WriteLine = (line) => console.log(line)) {
    this.write = write;
  }

  info(message: string): void {
    this.write(chalk.blue(message));
  }

  warn(message: string): void {
    this.write(chalk.yellow(`WARNING: ${message}`));
  }

  success(message: string): void {
    this.write(chalk.green(`✓ ${message}`));
  }

  failure(message: string): void {
    this.write(chalk.red(`✗ ${message}`));
  }
}
