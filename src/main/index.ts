#!/usr/bin/env node
/**
 * lossless2mp3 - executable entry point
 */

import { main } from './cli';

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exitCode = 1;
  },
);
