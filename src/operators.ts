/**
 * Operator Table
 * Precedence, associativity and arity for every operator symbol
 */

import {
  UNARY_MARKER,
  type BinaryOperatorSymbol,
  type OperatorInfo,
  type OperatorSymbol,
} from './token-types.js';

const OPERATOR_DEFINITIONS: Record<OperatorSymbol, OperatorInfo> = {
  [UNARY_MARKER]: {
    symbol: UNARY_MARKER,
    precedence: 4,
    associativity: 'right',
    arity: 'unary',
  },
  '^': { symbol: '^', precedence: 3, associativity: 'right', arity: 'binary' },
  x: { symbol: 'x', precedence: 2, associativity: 'left', arity: 'binary' },
  '/': { symbol: '/', precedence: 2, associativity: 'left', arity: 'binary' },
  '%': { symbol: '%', precedence: 2, associativity: 'left', arity: 'binary' },
  '+': { symbol: '+', precedence: 1, associativity: 'left', arity: 'binary' },
  '-': { symbol: '-', precedence: 1, associativity: 'left', arity: 'binary' },
};

/**
 * Operator table, higher precedence binds tighter.
 * Frozen at module load.
 */
export const OPERATORS: Readonly<Record<OperatorSymbol, OperatorInfo>> =
  Object.freeze(OPERATOR_DEFINITIONS);

export function isOperatorSymbol(ch: string): ch is OperatorSymbol {
  return Object.prototype.hasOwnProperty.call(OPERATORS, ch);
}

export function isBinaryOperator(ch: string): ch is BinaryOperatorSymbol {
  return isOperatorSymbol(ch) && OPERATORS[ch].arity === 'binary';
}

export function isUnaryMarker(ch: string): ch is typeof UNARY_MARKER {
  return ch === UNARY_MARKER;
}

export function precedence(symbol: OperatorSymbol): number {
  return OPERATORS[symbol].precedence;
}

export function isRightAssociative(symbol: OperatorSymbol): boolean {
  return OPERATORS[symbol].associativity === 'right';
}
