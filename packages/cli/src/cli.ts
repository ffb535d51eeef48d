#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   rowbridge schema ./table-schema.json --config ./config.json
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
