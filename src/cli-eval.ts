#!/usr/bin/env node
/**
 * intcalc CLI - Evaluate integer expressions
 *
 * Usage:
 *   intcalc "(2 x 3) ^ 2"
 *   intcalc --explain CALC-P006
 *   intcalc --help
 */

import { runCli } from './cli-exec.js';

const exitCode = runCli(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  cwd: process.cwd(),
});

process.exit(exitCode);
