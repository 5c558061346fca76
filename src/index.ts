/**
 * intcalc
 * Exports the lexer, validator, converter, evaluator and error taxonomy
 */

export {
  createLexerState,
  nextToken,
  normalize,
  tokenize,
  type LexerState,
  type NormalizeResult,
} from './lexer/index.js';
export { assertValid, validate, type ValidationResult } from './parser/index.js';
export {
  applyBinary,
  evaluatePostfix,
  formatPostfix,
  MAX_RESULT_BITS,
  Stack,
  toPostfix,
} from './runtime/index.js';
export {
  calculate,
  checkExpression,
  type CalculateOptions,
  type CalculationResult,
  type PipelineCallbacks,
  type PipelineStage,
  type StageEndEvent,
  type StageErrorEvent,
  type StageStartEvent,
} from './calculator.js';
export {
  renderCaretLine,
  renderDiagnostic,
  toDiagnostic,
  type Diagnostic,
} from './diagnostics.js';
export {
  isBinaryOperator,
  isOperatorSymbol,
  isRightAssociative,
  isUnaryMarker,
  OPERATORS,
  precedence,
} from './operators.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export * from './types.js';
