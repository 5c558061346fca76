/**
 * Lexer State
 * Tracks position in a normalized expression during tokenization
 */

import type { Expression, SourceLocation } from '../types.js';
import { locationAt } from '../source-location.js';

export interface LexerState {
  readonly expression: Expression;
  pos: number;
}

export function createLexerState(expression: Expression): LexerState {
  return { expression, pos: 0 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return locationAt(state.pos);
}

/** Character of the normalized text */
export function peek(state: LexerState): string {
  return state.expression.normalized.charAt(state.pos);
}

/** Character the user typed at the current position */
export function peekOriginal(state: LexerState): string {
  return state.expression.original.charAt(state.pos);
}

export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.expression.normalized.length;
}
