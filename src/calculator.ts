/**
 * Calculator
 * Runs normalize → tokenize → validate → convert → evaluate, stopping at the
 * first failure
 */

import { toDiagnostic, type Diagnostic } from './diagnostics.js';
import { normalize, tokenize } from './lexer/index.js';
import { assertValid } from './parser/index.js';
import { evaluatePostfix, formatPostfix, toPostfix } from './runtime/index.js';
import {
  isSyntaxFailure,
  type Expression,
  type PostfixToken,
  type Token,
} from './types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

export type PipelineStage =
  | 'normalize'
  | 'tokenize'
  | 'validate'
  | 'convert'
  | 'evaluate';

/** Event emitted before a stage runs */
export interface StageStartEvent {
  stage: PipelineStage;
}

/** Event emitted after a stage completes */
export interface StageEndEvent {
  stage: PipelineStage;
  /** Stage time in milliseconds */
  durationMs: number;
}

/** Event emitted when a stage fails */
export interface StageErrorEvent {
  stage: PipelineStage;
  error: Error;
}

export interface PipelineCallbacks {
  onStageStart?: ((event: StageStartEvent) => void) | undefined;
  onStageEnd?: ((event: StageEndEvent) => void) | undefined;
  onError?: ((event: StageErrorEvent) => void) | undefined;
}

export interface CalculateOptions {
  callbacks?: PipelineCallbacks | undefined;
}

export interface CalculationResult {
  readonly expression: Expression;
  readonly tokens: readonly Token[];
  readonly postfix: readonly PostfixToken[];
  /** Postfix tokens separated by single spaces, e.g. "2 3 x 2 ^" */
  readonly postfixText: string;
  readonly value: bigint;
}

function runStage<T>(
  stage: PipelineStage,
  callbacks: PipelineCallbacks | undefined,
  fn: () => T
): T {
  callbacks?.onStageStart?.({ stage });
  const startTime = performance.now();

  let result: T;
  try {
    result = fn();
  } catch (err) {
    if (err instanceof Error) {
      callbacks?.onError?.({ stage, error: err });
    }
    throw err;
  }

  callbacks?.onStageEnd?.({
    stage,
    durationMs: performance.now() - startTime,
  });
  return result;
}

// ============================================================
// PIPELINE
// ============================================================

interface CheckedExpression {
  readonly expression: Expression;
  readonly tokens: readonly Token[];
}

function parseExpression(
  source: string,
  callbacks: PipelineCallbacks | undefined
): CheckedExpression {
  const expression = runStage('normalize', callbacks, () => {
    const result = normalize(source);
    if (result.error !== null) {
      throw result.error;
    }
    return result.expression;
  });

  const tokens = runStage('tokenize', callbacks, () => tokenize(expression));
  runStage('validate', callbacks, () => assertValid(tokens, expression));

  return { expression, tokens };
}

/**
 * Convert and evaluate an infix expression.
 *
 * @throws {LexerError} First invalid character
 * @throws {ParseError} First grammar violation
 * @throws {EvaluationError} Division by zero or 0^0
 */
export function calculate(
  source: string,
  options: CalculateOptions = {}
): CalculationResult {
  const { callbacks } = options;
  const { expression, tokens } = parseExpression(source, callbacks);

  const postfix = runStage('convert', callbacks, () => toPostfix(tokens));
  const value = runStage('evaluate', callbacks, () => evaluatePostfix(postfix));

  return {
    expression,
    tokens,
    postfix,
    postfixText: formatPostfix(postfix),
    value,
  };
}

/**
 * Syntax check without evaluation.
 *
 * @returns The first syntax diagnostic, or null for a well-formed expression
 */
export function checkExpression(
  source: string,
  options: CalculateOptions = {}
): Diagnostic | null {
  try {
    parseExpression(source, options.callbacks);
    return null;
  } catch (err) {
    if (isSyntaxFailure(err)) {
      return toDiagnostic(err);
    }
    throw err;
  }
}
