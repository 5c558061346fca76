import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  NUMBER: 'NUMBER',
  OPERATOR: 'OPERATOR', // + - x / % ^ and the unary marker ~
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// EXPRESSION
// ============================================================

/**
 * User text paired with its normalized form.
 * Both strings have the same length; negation signs in `original`
 * appear as the unary marker in `normalized`.
 */
export interface Expression {
  readonly original: string;
  readonly normalized: string;
}

// ============================================================
// POSTFIX
// ============================================================

export type PostfixToken =
  | { readonly type: 'number'; readonly value: bigint }
  | { readonly type: 'operator'; readonly symbol: OperatorSymbol };

// ============================================================
// OPERATORS
// ============================================================

/** Internal symbol standing in for a negation sign */
export const UNARY_MARKER = '~';

export type BinaryOperatorSymbol = '+' | '-' | 'x' | '/' | '%' | '^';
export type OperatorSymbol = BinaryOperatorSymbol | typeof UNARY_MARKER;

export type Associativity = 'left' | 'right';
export type Arity = 'unary' | 'binary';

export interface OperatorInfo {
  readonly symbol: OperatorSymbol;
  readonly precedence: number;
  readonly associativity: Associativity;
  readonly arity: Arity;
}
