/**
 * Lexer Module
 * Normalizes user text and converts it into tokens
 */

export { normalize, type NormalizeResult } from './normalizer.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
