/**
 * Diagnostics
 * Caret rendering of syntax errors against the user's original text
 */

import type { SourceLocation, SyntaxFailure } from './types.js';

export interface Diagnostic {
  readonly errorId: string;
  readonly message: string;
  readonly location: SourceLocation;
}

export function toDiagnostic(error: SyntaxFailure): Diagnostic {
  return {
    errorId: error.errorId,
    message: error.message,
    location: error.location,
  };
}

/**
 * Caret line for a diagnostic: spaces up to its column, then `^ ` and the
 * message.
 *
 * @example
 * renderCaretLine({ errorId: 'CALC-P006', message: "Unmatched '(' found at position 1.", location: { column: 1, offset: 0 } })
 * // Returns: "^ Unmatched '(' found at position 1."
 */
export function renderCaretLine(diagnostic: Diagnostic): string {
  return `${' '.repeat(diagnostic.location.offset)}^ ${diagnostic.message}`;
}

/** The original text followed by the caret line */
export function renderDiagnostic(
  source: string,
  diagnostic: Diagnostic
): string {
  return `${source}\n${renderCaretLine(diagnostic)}`;
}
