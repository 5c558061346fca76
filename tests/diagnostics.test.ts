/**
 * Diagnostics Tests
 * Caret rendering against the original text
 */

import { describe, expect, it } from 'vitest';
import {
  checkExpression,
  renderCaretLine,
  renderDiagnostic,
  type Diagnostic,
} from '../src/index.js';

function diagnosticOf(source: string): Diagnostic {
  const diagnostic = checkExpression(source);
  if (diagnostic === null) {
    throw new Error(`expected a diagnostic for ${source}`);
  }
  return diagnostic;
}

describe('renderDiagnostic', () => {
  it('places the caret under the first column', () => {
    expect(renderDiagnostic('(1 + 2', diagnosticOf('(1 + 2'))).toBe(
      "(1 + 2\n^ Unmatched '(' found at position 1."
    );
  });

  it('places the caret on the boundary between operands', () => {
    expect(renderDiagnostic('2 3', diagnosticOf('2 3'))).toBe(
      '2 3\n ^ Expected operator at position 3.'
    );
  });

  it('places the caret past the end for a missing operand', () => {
    expect(renderDiagnostic('1 +', diagnosticOf('1 +'))).toBe(
      '1 +\n   ^ Missing operand at position 4.'
    );
  });

  it('shows the original minus, not the marker', () => {
    expect(renderDiagnostic('-5 + x', diagnosticOf('-5 + x'))).toBe(
      "-5 + x\n     ^ Expected operand, but found 'x' at position 6."
    );
  });

  it('rejects a group directly after a closing parenthesis', () => {
    expect(diagnosticOf('(1)(-2)').message).toBe(
      "Expected operator, but found '(' at position 4."
    );
  });
});

describe('renderCaretLine', () => {
  it('pads with one space per preceding column', () => {
    expect(
      renderCaretLine({
        errorId: 'CALC-L001',
        message: "Unexpected symbol '#' found at position 4.",
        location: { column: 4, offset: 3 },
      })
    ).toBe("   ^ Unexpected symbol '#' found at position 4.");
  });
});
