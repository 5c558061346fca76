/**
 * Converter
 * Shunting-yard transformation of infix tokens into postfix order
 */

import {
  isOperatorSymbol,
  isRightAssociative,
  isUnaryMarker,
  precedence,
} from '../operators.js';
import {
  TOKEN_TYPES,
  type OperatorSymbol,
  type PostfixToken,
  type Token,
} from '../types.js';
import { Stack } from './stack.js';

type StackEntry = OperatorSymbol | '(';

/** True when `top` must leave the stack before `incoming` is pushed */
function shouldPop(top: StackEntry, incoming: OperatorSymbol): boolean {
  if (top === '(') return false;
  if (isRightAssociative(incoming)) {
    return precedence(top) > precedence(incoming);
  }
  return precedence(top) >= precedence(incoming);
}

/**
 * Convert validated infix tokens to postfix.
 *
 * Tokens must have passed validation; a stray parenthesis or an unknown
 * operator here is an internal error.
 */
export function toPostfix(tokens: readonly Token[]): PostfixToken[] {
  const operators = new Stack<StackEntry>();
  const output: PostfixToken[] = [];

  const emit = (entry: StackEntry): void => {
    if (entry === '(') {
      throw new Error("Malformed infix expression: unmatched '('");
    }
    output.push({ type: 'operator', symbol: entry });
  };

  for (const token of tokens) {
    switch (token.type) {
      case TOKEN_TYPES.NUMBER:
        output.push({ type: 'number', value: BigInt(token.value) });
        break;

      case TOKEN_TYPES.LPAREN:
        operators.push('(');
        break;

      case TOKEN_TYPES.RPAREN: {
        let top = operators.peek();
        while (top !== undefined && top !== '(') {
          emit(operators.pop());
          top = operators.peek();
        }
        if (top === undefined) {
          throw new Error("Malformed infix expression: unmatched ')'");
        }
        operators.pop();
        break;
      }

      case TOKEN_TYPES.OPERATOR: {
        const symbol = token.value;
        if (!isOperatorSymbol(symbol)) {
          throw new Error(`Unknown operator: ${symbol}`);
        }
        // A marker binds to the operand right after it, nothing to compare
        if (!isUnaryMarker(symbol)) {
          let top = operators.peek();
          while (top !== undefined && shouldPop(top, symbol)) {
            emit(operators.pop());
            top = operators.peek();
          }
        }
        operators.push(symbol);
        break;
      }
    }
  }

  while (!operators.isEmpty()) {
    emit(operators.pop());
  }

  return output;
}

/** Render postfix tokens separated by single spaces */
export function formatPostfix(tokens: readonly PostfixToken[]): string {
  return tokens
    .map((token) =>
      token.type === 'number' ? token.value.toString() : token.symbol
    )
    .join(' ');
}
