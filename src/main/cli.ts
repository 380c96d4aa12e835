/**
 * lossless2mp3 command line
 *
 * Parses flags with commander, builds the configuration, checks for the
 * external tools, then runs the conversion pipeline and prints a summary.
 *
 * Exit status is 1 for fatal conditions (missing tools, invalid or
 * incomplete configuration, unwritable output root) and 0 otherwise, even
 * when individual tracks failed.
 */

import * as path from 'path';
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { APP_NAME, APP_VERSION } from '../shared/types';
import type { ConverterConfig, PipelineReporter, RunSummary } from '../shared/types';
import {
  loadConfigFile,
  mergeConfigSources,
  validateConfig,
} from './services/configuration';
import { DependencyError, isFatalError, isPipelineError } from './services/errors';
import { INSTALL_HINTS, REQUIRED_TOOLS, checkDependencies } from './services/externalTools';
import { Logger } from './services/logger';
import { ConversionPipeline } from './services/pipeline';
import type { PipelineOptions } from './services/pipeline';
import { ConsoleReporter } from './utils/consoleReporter';
import type { WriteLine } from './utils/consoleReporter';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Flags as commander hands them over */
export interface CliOptions {
  artist?: string;
  album?: string;
  genre?: string;
  disc?: string;
  output?: string;
  parallel?: string;
  source?: string;
  timeout?: string;
  config?: string;
  logDir?: string;
  /** false when `--no-log-file` is given */
  logFile?: boolean;
}

/** Anything that can run a pipeline */
export interface RunnablePipeline {
  run(): Promise<RunSummary>;
}

/** Seams for tests; every field has a production default */
export interface CliDependencies {
  /** Output for banner, errors and summary */
  print?: WriteLine;
  reporter?: PipelineReporter;
  /** Names of missing external tools */
  findMissingTools?: () => string[];
  createPipeline?: (options: PipelineOptions) => RunnablePipeline;
  createLogger?: (config: ConverterConfig) => Logger;
  cwd?: string;
}

// ─── Configuration ───────────────────────────────────────────────────────────

/**
 * Maps flags onto config-file keys. Flags that were not given stay
 * undefined so they do not override the config file.
 */
export function optionsToRawConfig(options: CliOptions): Record<string, unknown> {
  return {
    artist: options.artist,
    album: options.album,
    genre: options.genre,
    disc: options.disc,
    outputDir: options.output,
    sourceDir: options.source,
    parallelism: options.parallel,
    timeoutSeconds: options.timeout,
    logDir: options.logDir,
    writeLogFile: options.logFile === false ? false : undefined,
  };
}

/**
 * Builds the validated configuration from `--config` and the flags.
 *
 * @throws ConfigError if the config file is unusable or the artist is missing
 */
export function resolveConfig(options: CliOptions, cwd: string = process.cwd()): ConverterConfig {
  const fileValues = options.config ? loadConfigFile(path.resolve(cwd, options.config)) : {};
  return validateConfig(mergeConfigSources(fileValues, optionsToRawConfig(options)));
}

// ─── Output ──────────────────────────────────────────────────────────────────

export function formatBanner(config: ConverterConfig): string[] {
  const lines = [chalk.green(`=== Audio to MP3 Converter v${APP_VERSION} ===`)];
  lines.push(chalk.blue(`Artist: ${config.artist}`));
  if (config.album) lines.push(chalk.blue(`Album: ${config.album}`));
  if (config.genre) lines.push(chalk.blue(`Genre: ${config.genre}`));
  if (config.disc) lines.push(chalk.blue(`Disc: ${config.disc}`));
  lines.push(chalk.blue(`Output: ${config.outputDir}`));
  lines.push(chalk.blue(`Parallel Jobs: ${config.parallelism}`));
  return lines;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    chalk.green('=== Conversion Complete ==='),
    chalk.green(`✓ Successfully converted: ${summary.successCount} file(s)`),
  ];
  if (summary.errorCount > 0) {
    lines.push(chalk.red(`✗ Failed to convert: ${summary.errorCount} file(s)`));
    for (const failure of summary.failures) {
      lines.push(chalk.red(`  - ${failure.reason}`));
    }
  }
  lines.push(chalk.blue(`Output directory: ${summary.outputDir}`));
  lines.push(chalk.blue(`Completed in ${(summary.durationMs / 1000).toFixed(1)}s`));
  return lines;
}

// ─── Run ─────────────────────────────────────────────────────────────────────

/**
 * Runs one conversion with already-parsed flags.
 *
 * @returns The process exit status
 */
export async function runCli(options: CliOptions, deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string): void => console.log(line));
  const cwd = deps.cwd ?? process.cwd();

  let config: ConverterConfig;
  try {
    config = resolveConfig(options, cwd);
  } catch (error: unknown) {
    if (!isPipelineError(error)) throw error;
    print(chalk.red(`ERROR: ${error.message}`));
    return 1;
  }

  const missing = (deps.findMissingTools ?? ((): string[] => checkDependencies(REQUIRED_TOOLS)))();
  if (missing.length > 0) {
    const dependencyError = new DependencyError(
      `Missing required tools: ${missing.join(', ')}`,
      missing,
    );
    print(chalk.red(`ERROR: ${dependencyError.message}`));
    print('');
    print('Installation instructions:');
    for (const hint of INSTALL_HINTS) {
      print(`  ${hint}`);
    }
    return 1;
  }

  const logger = deps.createLogger
    ? deps.createLogger(config)
    : new Logger({ logDir: config.logDir ?? undefined, writeToFile: config.writeLogFile });
  await logger.initialize();
  logger.info(
    `Starting run: artist="${config.artist}", source="${config.sourceDir}", output="${config.outputDir}", parallelism=${config.parallelism}`,
  );

  for (const line of formatBanner(config)) {
    print(line);
  }
  print('');

  const pipelineOptions: PipelineOptions = {
    config,
    logger,
    reporter: deps.reporter ?? new ConsoleReporter(print),
    cwd,
  };
  const pipeline = deps.createPipeline
    ? deps.createPipeline(pipelineOptions)
    : new ConversionPipeline(pipelineOptions);

  let summary: RunSummary;
  try {
    summary = await pipeline.run();
  } catch (error: unknown) {
    if (!isPipelineError(error) || !isFatalError(error)) throw error;
    logger.logPipelineError(error);
    print(chalk.red(`ERROR: ${error.message}`));
    return 1;
  }

  print('');
  for (const line of formatSummary(summary)) {
    print(line);
  }
  const logFileError = logger.getFileError();
  if (logger.isWritingToFile()) {
    print(chalk.blue(`Log file: ${logger.getLogFilePath()}`));
  } else if (logFileError) {
    print(chalk.yellow(`WARNING: ${logFileError}`));
  }
  return 0;
}

/**
 * Builds the commander program. `onExit` receives the status of the run.
 */
export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Convert CUE+FLAC/APE albums and standalone FLAC/APE files to tagged MP3')
    .version(APP_VERSION)
    .option('--artist <name>', 'artist tag for every file (required)')
    .option('--album <name>', 'album tag (default: CUE title or file tags)')
    .option('--genre <genre>', 'genre tag')
    .option('--disc <number>', 'disc number tag')
    .option('-o, --output <dir>', 'output directory (default: MP3_Export)')
    .option('-j, --parallel <n>', 'number of parallel conversions (default: 8)')
    .option('-s, --source <dir>', 'directory to scan (default: current directory)')
    .option('--timeout <seconds>', 'kill a conversion after this many seconds')
    .option('--config <file>', 'JSON config file; flags override its values')
    .option('--log-dir <dir>', 'directory for the daily log file')
    .option('--no-log-file', 'do not write a log file')
    .exitOverride()
    .action(async (options: CliOptions) => {
      onExit(await runCli(options, deps));
    });

  return program;
}

/**
 * Entry point used by the `lossless2mp3` binary.
 *
 * @returns The process exit status
 */
export async function main(argv: readonly string[] = process.argv, deps: CliDependencies = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
