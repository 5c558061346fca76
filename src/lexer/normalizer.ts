/**
 * Normalizer
 * Replaces negation signs with the unary marker, keeping columns aligned
 */

import { isBinaryOperator } from '../operators.js';
import { locationAt } from '../source-location.js';
import { LexerError, UNARY_MARKER, type Expression } from '../types.js';
import { isValidSymbol, isWhitespace } from './helpers.js';

export interface NormalizeResult {
  readonly expression: Expression;
  /** First invalid character, if any */
  readonly error: LexerError | null;
}

/**
 * Build the normalized form of `source`.
 *
 * A `-` is a negation when an operand is expected: at the start, after `(`
 * and after any operator. Scanning continues past invalid characters so the
 * normalized text always has the same length as the source; only the first
 * invalid character is reported.
 */
export function normalize(source: string): NormalizeResult {
  let normalized = '';
  let error: LexerError | null = null;
  let operandExpected = true;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);

    if (isWhitespace(ch)) {
      normalized += ch;
      continue;
    }

    if (error === null && !isValidSymbol(ch)) {
      error = new LexerError(
        'CALC-L001',
        { symbol: ch, position: i + 1 },
        locationAt(i)
      );
    }

    normalized += ch === '-' && operandExpected ? UNARY_MARKER : ch;
    operandExpected = ch === '(' || isBinaryOperator(ch);
  }

  return {
    expression: { original: source, normalized },
    error,
  };
}
