/**
 * CLI Shared Utilities
 * Common formatting functions for the intcalc CLI
 */

import * as fs from 'fs';
import type { CalculationResult } from './calculator.js';

/**
 * Success output: the postfix form, then the value.
 *
 * @example
 * formatResult(calculate('(2 x 3) ^ 2'))
 * // ['Postfix expression: 2 3 x 2 ^', 'Evaluation:         36']
 */
export function formatResult(result: CalculationResult): string[] {
  return [
    `Postfix expression: ${result.postfixText}`,
    `Evaluation:         ${result.value.toString()}`,
  ];
}

/** Positional arguments are joined with no separator, then trimmed */
export function joinExpression(args: readonly string[]): string {
  return args.join('').trim();
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

/** Package version read from package.json */
export const VERSION = readVersion();
