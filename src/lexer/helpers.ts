/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import { isBinaryOperator } from '../operators.js';
import type { SourceLocation, Token, TokenType } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

export function isParenthesis(ch: string): boolean {
  return ch === '(' || ch === ')';
}

/** Characters a user may type, whitespace aside */
export function isValidSymbol(ch: string): boolean {
  return isDigit(ch) || isBinaryOperator(ch) || isParenthesis(ch);
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}
