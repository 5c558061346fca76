/**
 * Validator
 * Single pass over the tokens checking operand/operator order and parentheses
 */

import { isUnaryMarker } from '../operators.js';
import { Stack } from '../runtime/stack.js';
import { locationAt } from '../source-location.js';
import {
  ParseError,
  TOKEN_TYPES,
  type Expression,
  type SourceLocation,
  type Token,
} from '../types.js';

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly error: ParseError };

/** Open parenthesis awaiting its match */
interface PositionMarker {
  readonly character: string;
  readonly location: SourceLocation;
}

function fail(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): ValidationResult {
  return { valid: false, error: new ParseError(errorId, context, location) };
}

/**
 * Check that `tokens` form a well-formed infix expression.
 *
 * Scanning stops at the first violation, so at most one error is returned.
 * Symbols in messages come from the original text: a marker is reported as
 * the `-` the user typed.
 */
export function validate(
  tokens: readonly Token[],
  expression: Expression
): ValidationResult {
  const open = new Stack<PositionMarker>();
  let operandExpected = true;

  for (const token of tokens) {
    const start = token.span.start;
    const symbol = expression.original.charAt(start.offset);

    switch (token.type) {
      case TOKEN_TYPES.NUMBER:
        if (!operandExpected) {
          // Caret sits on the boundary before the second operand
          return fail(
            'CALC-P001',
            { position: start.column },
            locationAt(start.offset - 1)
          );
        }
        operandExpected = false;
        break;

      case TOKEN_TYPES.OPERATOR:
        if (isUnaryMarker(token.value)) {
          if (!operandExpected) {
            return fail('CALC-P003', { symbol, position: start.column }, start);
          }
        } else {
          if (operandExpected) {
            return fail('CALC-P002', { symbol, position: start.column }, start);
          }
          operandExpected = true;
        }
        break;

      case TOKEN_TYPES.LPAREN:
        if (!operandExpected) {
          return fail('CALC-P003', { symbol, position: start.column }, start);
        }
        open.push({ character: symbol, location: start });
        break;

      case TOKEN_TYPES.RPAREN:
        if (operandExpected) {
          return fail('CALC-P002', { symbol, position: start.column }, start);
        }
        if (open.isEmpty()) {
          return fail('CALC-P004', { position: start.column }, start);
        }
        open.pop();
        break;
    }
  }

  if (operandExpected) {
    const end = locationAt(expression.original.length);
    return fail('CALC-P005', { position: end.column }, end);
  }

  const innermost = open.peek();
  if (innermost !== undefined) {
    return fail(
      'CALC-P006',
      { position: innermost.location.column },
      innermost.location
    );
  }

  return { valid: true };
}

/**
 * Like {@link validate}, but throws the error.
 *
 * @throws {ParseError} On the first violation
 */
export function assertValid(
  tokens: readonly Token[],
  expression: Expression
): void {
  const result = validate(tokens, expression);
  if (!result.valid) {
    throw result.error;
  }
}
