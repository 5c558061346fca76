/**
 * Tests for CLI Error Formatter
 */

import { describe, it, expect } from 'vitest';
import {
  formatError,
  isOutputFormat,
  type FormatOptions,
} from '../../src/cli-error-formatter.js';
import {
  EvaluationError,
  LexerError,
  locationAt,
  ParseError,
} from '../../src/types.js';

const human: FormatOptions = { format: 'human', verbose: false };

describe('formatError', () => {
  describe('human format', () => {
    it('renders a caret under the offending character', () => {
      const error = new LexerError(
        'CALC-L001',
        { symbol: '*', position: 3 },
        locationAt(2)
      );

      expect(formatError(error, '2 * 3', human)).toBe(
        "2 * 3\n  ^ Unexpected symbol '*' found at position 3."
      );
    });

    it('renders evaluation errors without a caret', () => {
      const error = new EvaluationError('CALC-R001');

      expect(formatError(error, '7 % 0', human)).toBe(
        'Error:              Cannot evaluate expression, division by zero.'
      );
    });

    it('appends the resolution when verbose', () => {
      const error = new ParseError('CALC-P005', { position: 4 }, locationAt(3));

      expect(
        formatError(error, '1 +', { format: 'human', verbose: true })
      ).toBe(
        '1 +\n   ^ Missing operand at position 4.\n   = help: Complete the expression with a number.'
      );
    });
  });

  describe('compact format', () => {
    it('renders one line with the error ID', () => {
      const error = new ParseError('CALC-P004', { position: 8 }, locationAt(7));

      expect(
        formatError(error, '(1 + 2))', { format: 'compact', verbose: true })
      ).toBe("[CALC-P004] Unmatched ')' found at position 8.");
    });
  });

  describe('json format', () => {
    it('renders an LSP-style diagnostic for syntax errors', () => {
      const error = new ParseError('CALC-P006', { position: 1 }, locationAt(0));
      const output = formatError(error, '(1 + 2', {
        format: 'json',
        verbose: true,
      });

      expect(JSON.parse(output)).toEqual({
        errorId: 'CALC-P006',
        severity: 1,
        message: "Unmatched '(' found at position 1.",
        source: 'intcalc',
        code: 'CALC-P006',
        kind: 'syntax',
        range: {
          start: { line: 0, character: 0 },
          end: { line: 0, character: 1 },
        },
        resolution: "Add the missing ')' or remove the '('.",
      });
    });

    it('omits the range for evaluation errors', () => {
      const error = new EvaluationError('CALC-R002');
      const output = formatError(error, '0 ^ 0', {
        format: 'json',
        verbose: false,
      });

      expect(JSON.parse(output)).toEqual({
        errorId: 'CALC-R002',
        severity: 1,
        message: 'Cannot evaluate expression, 0^0 is undefined.',
        source: 'intcalc',
        code: 'CALC-R002',
        kind: 'evaluation',
      });
    });

    it('pretty-prints with two-space indentation', () => {
      const error = new EvaluationError('CALC-R002');
      const output = formatError(error, '0 ^ 0', {
        format: 'json',
        verbose: false,
      });

      expect(output.split('\n')[1]).toBe('  "errorId": "CALC-R002",');
    });
  });
});

describe('isOutputFormat', () => {
  it('accepts the three formats', () => {
    expect(['human', 'json', 'compact'].every(isOutputFormat)).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isOutputFormat('xml')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });
});
