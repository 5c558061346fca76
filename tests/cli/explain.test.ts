/**
 * Tests for --explain documentation
 */

import { describe, it, expect } from 'vitest';
import { explainError } from '../../src/cli-explain.js';

describe('explainError', () => {
  it('renders cause, resolution and examples', () => {
    expect(explainError('CALC-P005')).toBe(
      [
        'CALC-P005: Missing operand',
        '',
        'Cause:',
        '  Expression ends with an operator or an opening parenthesis.',
        '',
        'Resolution:',
        '  Complete the expression with a number.',
        '',
        'Examples:',
        '  Trailing operator',
        '',
        '    intcalc "1 +"',
      ].join('\n')
    );
  });

  it('lists every example', () => {
    const output = explainError('CALC-R001') ?? '';

    expect(output).toContain('    intcalc "10 / 0"');
    expect(output).toContain('    intcalc "7 % (2 - 2)"');
  });

  it('returns null for a malformed ID', () => {
    expect(explainError('P005')).toBeNull();
    expect(explainError('calc-p005')).toBeNull();
  });

  it('returns null for an unregistered ID', () => {
    expect(explainError('CALC-L099')).toBeNull();
  });
});
