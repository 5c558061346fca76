/**
 * Evaluator
 * Stack machine over postfix tokens
 */

import {
  EvaluationError,
  UNARY_MARKER,
  type BinaryOperatorSymbol,
  type PostfixToken,
} from '../types.js';
import { Stack } from './stack.js';

/** Largest result accepted from `x` and `^`, in bits */
export const MAX_RESULT_BITS = 1_048_576n;

function bitLength(value: bigint): bigint {
  return BigInt((value < 0n ? -value : value).toString(2).length);
}

/** `bits` is a lower bound on the size of the result */
function checkResultSize(bits: bigint): void {
  if (bits > MAX_RESULT_BITS) {
    throw new EvaluationError('CALC-R003');
  }
}

/**
 * Integer power. A negative exponent truncates the exact quotient toward
 * zero, so only bases 1 and -1 give a nonzero result.
 */
function power(base: bigint, exponent: bigint): bigint {
  if (base === 0n && exponent === 0n) {
    throw new EvaluationError('CALC-R002');
  }
  if (exponent < 0n && base === 0n) {
    throw new EvaluationError('CALC-R001');
  }
  if (base === 0n || base === 1n) return base;
  if (base === -1n) return exponent % 2n === 0n ? 1n : -1n;
  if (exponent < 0n) return 0n;

  // |base| >= 2 has at least bitLength - 1 bits per factor
  checkResultSize((bitLength(base) - 1n) * exponent + 1n);
  return base ** exponent;
}

/**
 * Apply a binary operator. BigInt division and remainder already truncate
 * toward zero.
 *
 * @throws {EvaluationError} Division or remainder by zero, 0^0, or a
 * result larger than {@link MAX_RESULT_BITS}
 */
export function applyBinary(
  symbol: BinaryOperatorSymbol,
  left: bigint,
  right: bigint
): bigint {
  switch (symbol) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case 'x':
      if (left !== 0n && right !== 0n) {
        checkResultSize(bitLength(left) + bitLength(right) - 1n);
      }
      return left * right;
    case '/':
    case '%':
      if (right === 0n) {
        throw new EvaluationError('CALC-R001');
      }
      return symbol === '/' ? left / right : left % right;
    case '^':
      return power(left, right);
  }
}

function popOperand(stack: Stack<bigint>): bigint {
  if (stack.isEmpty()) {
    throw new Error('Malformed postfix expression: missing operand');
  }
  return stack.pop();
}

/**
 * Evaluate postfix tokens produced by the converter.
 *
 * @throws {EvaluationError} On the first arithmetic failure
 */
export function evaluatePostfix(tokens: readonly PostfixToken[]): bigint {
  const stack = new Stack<bigint>();

  for (const token of tokens) {
    if (token.type === 'number') {
      stack.push(token.value);
      continue;
    }

    if (token.symbol === UNARY_MARKER) {
      stack.push(-popOperand(stack));
      continue;
    }

    // Most recent value is the right-hand operand
    const right = popOperand(stack);
    const left = popOperand(stack);
    stack.push(applyBinary(token.symbol, left, right));
  }

  if (stack.size !== 1) {
    throw new Error(
      `Malformed postfix expression: ${stack.size} values left on the stack`
    );
  }
  return stack.pop();
}
