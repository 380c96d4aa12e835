/**
 * External Tool Runner
 *
 * Thin wrapper over child processes for ffmpeg, shnsplit and cueprint,
 * plus the PATH lookup used by the startup dependency check.
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { ToolError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Captured process output */
export interface ToolOutput {
  stdout: string;
  stderr: string;
}

/** Options for a single tool invocation */
export interface RunToolOptions {
  /** Kill the process after this many ms (0 or undefined = no limit) */
  timeoutMs?: number;
  /** Working directory for the child process */
  cwd?: string;
}

/**
 * Runs an executable and resolves with its output, or rejects with a
 * ToolError on spawn failure, timeout or non-zero exit. Injected into
 * services so tests can substitute an in-process fake.
 */
export type ToolRunner = (
  command: string,
  args: readonly string[],
  options?: RunToolOptions,
) => Promise<ToolOutput>;

/** A tool the converter needs, with an install hint */
export interface RequiredTool {
  name: string;
  purpose: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const REQUIRED_TOOLS: readonly RequiredTool[] = [
  { name: 'ffmpeg', purpose: 'decoding and MP3 encoding' },
  { name: 'shnsplit', purpose: 'splitting album images at CUE breakpoints' },
  { name: 'cueprint', purpose: 'reading CUE sheet metadata' },
];

export const INSTALL_HINTS: readonly string[] = [
  'Ubuntu/Debian: sudo apt-get install ffmpeg cuetools shntool',
  'macOS: brew install ffmpeg cuetools shntool',
  'Fedora: sudo dnf install ffmpeg cuetools shntool',
];

/** Output larger than this is treated as a tool failure by execFile */
const MAX_BUFFER = 16 * 1024 * 1024;

// ─── Process Execution ───────────────────────────────────────────────────────

/**
 * Default ToolRunner backed by `child_process.execFile`.
 */
export const runTool: ToolRunner = (command, args, options = {}) => {
  return new Promise<ToolOutput>((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        timeout: options.timeoutMs ?? 0,
        cwd: options.cwd,
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }

        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(
            new ToolError(`${command} not found. Is it installed and on your PATH?`, {
              tool: command,
              stderr,
            }),
          );
          return;
        }

        if (error.killed && options.timeoutMs) {
          reject(
            new ToolError(`${command} timed out after ${options.timeoutMs}ms`, {
              tool: command,
              stderr,
            }),
          );
          return;
        }

        const exitCode = typeof code === 'number' ? code : null;
        const detail = stderr.trim();
        reject(
          new ToolError(
            `${command} exited with code ${exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`,
            { tool: command, exitCode, stderr },
          ),
        );
      },
    );
  });
};

// ─── Dependency Check ────────────────────────────────────────────────────────

/**
 * File extensions tried after an executable name: PATHEXT entries on
 * Windows, none elsewhere.
 */
export function executableExtensions(
  platform: NodeJS.Platform = process.platform,
  pathExt: string = process.env.PATHEXT ?? '.EXE;.CMD;.BAT',
): string[] {
  return platform === 'win32' ? pathExt.split(';').filter(Boolean) : [''];
}

/**
 * Looks an executable up on PATH.
 *
 * @param name - Bare executable name, e.g. 'ffmpeg'
 * @param envPath - PATH value to search (defaults to process.env.PATH)
 * @param extensions - Suffixes to try (defaults to executableExtensions())
 * @returns Absolute path of the first match, or null
 */
export function findExecutable(
  name: string,
  envPath: string = process.env.PATH ?? '',
  extensions: readonly string[] = executableExtensions(),
): string | null {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      try {
        fs.accessSync(candidate, fs.constants.X_OK);
        if (fs.statSync(candidate).isFile()) {
          return candidate;
        }
      } catch {
        // Not here; keep looking
      }
    }
  }

  return null;
}

/**
 * Returns the names of required tools that cannot be found.
 */
export function checkDependencies(
  tools: readonly RequiredTool[] = REQUIRED_TOOLS,
  envPath?: string,
  extensions?: readonly string[],
): string[] {
  return tools
    .filter((tool) => findExecutable(tool.name, envPath, extensions) === null)
    .map((t) => t.name);
}
