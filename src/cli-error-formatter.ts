/**
 * CLI Error Formatter
 * Format calculator errors for human-readable, JSON, or compact output
 */

import { renderDiagnostic, toDiagnostic } from './diagnostics.js';
import {
  ERROR_REGISTRY,
  EvaluationError,
  isSyntaxFailure,
  type CalcError,
} from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json' || value === 'compact';
}

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: OutputFormat;
  /** Append the registry resolution to the error */
  readonly verbose: boolean;
}

/** Label padding matches the `Evaluation:` line of successful output */
const EVALUATION_ERROR_LABEL = 'Error:              ';

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format a calculator error for stderr.
 *
 * - Human format: original text plus caret line for syntax errors,
 *   `Error:` line for evaluation errors
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @param error - Error raised by the pipeline
 * @param source - Expression text the user supplied
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: CalcError,
  source: string,
  options: FormatOptions
): string {
  if (!isOutputFormat(options.format)) {
    throw new TypeError(`Unknown format: ${String(options.format)}`);
  }

  if (options.format === 'json') {
    return formatErrorJson(error, options);
  }

  if (options.format === 'compact') {
    return `[${error.errorId}] ${error.message}`;
  }

  return formatErrorHuman(error, source, options);
}

function resolutionFor(error: CalcError): string | undefined {
  return ERROR_REGISTRY.get(error.errorId)?.resolution;
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * (1 + 2
 * ^ Unmatched '(' found at position 1.
 * ```
 */
function formatErrorHuman(
  error: CalcError,
  source: string,
  options: FormatOptions
): string {
  const lines: string[] = [];

  if (isSyntaxFailure(error)) {
    lines.push(renderDiagnostic(source, toDiagnostic(error)));
  } else {
    lines.push(`${EVALUATION_ERROR_LABEL}${error.message}`);
  }

  const resolution = resolutionFor(error);
  if (options.verbose && resolution !== undefined) {
    lines.push(`   = help: ${resolution}`);
  }

  return lines.join('\n');
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 */
function formatErrorJson(error: CalcError, options: FormatOptions): string {
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    range?: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
    kind: 'syntax' | 'evaluation';
    resolution?: string;
  } = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'intcalc',
    code: error.errorId,
    kind: error instanceof EvaluationError ? 'evaluation' : 'syntax',
  };

  if (error.location) {
    // LSP positions are 0-based
    diagnostic.range = {
      start: { line: 0, character: error.location.offset },
      end: { line: 0, character: error.location.offset + 1 },
    };
  }

  const resolution = resolutionFor(error);
  if (options.verbose && resolution !== undefined) {
    diagnostic.resolution = resolution;
  }

  return JSON.stringify(diagnostic, null, 2);
}
