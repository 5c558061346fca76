/**
 * Validator Tests
 * Operand/operator order, parentheses and first-error reporting
 */

import { describe, expect, it } from 'vitest';
import {
  assertValid,
  normalize,
  ParseError,
  tokenize,
  type ValidationResult,
} from '../../src/index.js';
import { validateSource } from '../helpers/calc.js';

function errorOf(result: ValidationResult): ParseError {
  if (result.valid) {
    throw new Error('expected a validation error');
  }
  return result.error;
}

describe('validate', () => {
  describe('well-formed expressions', () => {
    it.each([
      '(2 x 3) ^ 2',
      '-5 + 3',
      '-(-(1))',
      '1',
      '  7  ',
      '10 % 3 - 2 ^ -1',
      '((((4))))',
    ])('accepts %s', (source) => {
      expect(validateSource(source)).toEqual({ valid: true });
    });
  });

  describe('expected operator', () => {
    it('points at the boundary before the second operand', () => {
      const error = errorOf(validateSource('2 3'));

      expect(error.errorId).toBe('CALC-P001');
      expect(error.message).toBe('Expected operator at position 3.');
      expect(error.location).toEqual({ column: 2, offset: 1 });
    });

    it('detects a number right after a closed group', () => {
      const error = errorOf(validateSource('(1 + 2)3'));

      expect(error.message).toBe('Expected operator at position 8.');
      expect(error.location.offset).toBe(6);
    });

    it('reports an opening parenthesis after an operand', () => {
      const error = errorOf(validateSource('2(3)'));

      expect(error.errorId).toBe('CALC-P003');
      expect(error.message).toBe(
        "Expected operator, but found '(' at position 2."
      );
    });
  });

  describe('expected operand', () => {
    it('reports a binary operator where an operand belongs', () => {
      const error = errorOf(validateSource('2 + x 3'));

      expect(error.errorId).toBe('CALC-P002');
      expect(error.message).toBe(
        "Expected operand, but found 'x' at position 5."
      );
      expect(error.location).toEqual({ column: 5, offset: 4 });
    });

    it('reports empty parentheses', () => {
      expect(errorOf(validateSource('()')).message).toBe(
        "Expected operand, but found ')' at position 2."
      );
    });

    it('reports a leading binary operator', () => {
      expect(errorOf(validateSource('+1')).message).toBe(
        "Expected operand, but found '+' at position 1."
      );
    });
  });

  describe('parentheses', () => {
    it('reports an unmatched closing parenthesis', () => {
      const error = errorOf(validateSource('(1 + 2))'));

      expect(error.errorId).toBe('CALC-P004');
      expect(error.message).toBe("Unmatched ')' found at position 8.");
    });

    it('reports an unmatched opening parenthesis', () => {
      const error = errorOf(validateSource('(1 + 2'));

      expect(error.errorId).toBe('CALC-P006');
      expect(error.message).toBe("Unmatched '(' found at position 1.");
      expect(error.location).toEqual({ column: 1, offset: 0 });
    });

    it('reports the innermost unmatched opening parenthesis', () => {
      expect(errorOf(validateSource('((1) + (2')).message).toBe(
        "Unmatched '(' found at position 8."
      );
    });

    it('reports position p+1 for a single unmatched parenthesis at offset p', () => {
      const cases: Array<[string, number]> = [
        ['(1', 0],
        ['1 + (2 x 3', 4],
        ['-(-(5) + 1', 1],
        ['4 ^ (((2)) - 1', 4],
      ];

      for (const [source, offset] of cases) {
        expect(errorOf(validateSource(source)).message).toBe(
          `Unmatched '(' found at position ${offset + 1}.`
        );
      }
    });
  });

  describe('missing operand', () => {
    it('reports a trailing operator after the last column', () => {
      const error = errorOf(validateSource('1 +'));

      expect(error.errorId).toBe('CALC-P005');
      expect(error.message).toBe('Missing operand at position 4.');
      expect(error.location).toEqual({ column: 4, offset: 3 });
    });

    it('counts trailing whitespace in the length', () => {
      expect(errorOf(validateSource('5 - ')).message).toBe(
        'Missing operand at position 5.'
      );
    });

    it('reports an empty expression', () => {
      expect(errorOf(validateSource('')).message).toBe(
        'Missing operand at position 1.'
      );
    });

    it('takes precedence over an unmatched parenthesis', () => {
      expect(errorOf(validateSource('(1 +')).message).toBe(
        'Missing operand at position 5.'
      );
    });
  });

  it('stops at the first violation', () => {
    expect(errorOf(validateSource('2 3 + )')).errorId).toBe('CALC-P001');
  });

  describe('assertValid', () => {
    it('throws the validation error', () => {
      const { expression } = normalize('(1 + 2');
      const tokens = tokenize(expression);

      expect(() => assertValid(tokens, expression)).toThrow(ParseError);
      expect(() => assertValid(tokens, expression)).toThrow(
        "Unmatched '(' found at position 1."
      );
    });
  });
});
