/**
 * Tokenizer
 * Turns a normalized expression into typed tokens
 */

import { isOperatorSymbol, isUnaryMarker } from '../operators.js';
import { LexerError, TOKEN_TYPES, type Expression, type Token } from '../types.js';
import { isDigit, isWhitespace, makeToken } from './helpers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekOriginal,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';
  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }
  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

/** Read one token; the caller skips whitespace and checks for the end */
export function nextToken(state: LexerState): Token {
  const start = currentLocation(state);
  const ch = peek(state);

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (ch === '(' || ch === ')') {
    advance(state);
    const type = ch === '(' ? TOKEN_TYPES.LPAREN : TOKEN_TYPES.RPAREN;
    return makeToken(type, ch, start, currentLocation(state));
  }

  // A marker is only legal where the user typed a negation sign
  if (
    isOperatorSymbol(ch) &&
    (!isUnaryMarker(ch) || peekOriginal(state) === '-')
  ) {
    advance(state);
    return makeToken(TOKEN_TYPES.OPERATOR, ch, start, currentLocation(state));
  }

  throw new LexerError(
    'CALC-L001',
    { symbol: peekOriginal(state), position: start.column },
    start
  );
}

export function tokenize(expression: Expression): Token[] {
  const state = createLexerState(expression);
  const tokens: Token[] = [];

  skipWhitespace(state);
  while (!isAtEnd(state)) {
    tokens.push(nextToken(state));
    skipWhitespace(state);
  }

  return tokens;
}
