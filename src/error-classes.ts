/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface CalcErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all calculator errors.
 * Provides structured data for host applications to format as needed.
 */
export class CalcError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: CalcErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    super(data.message);
    this.name = 'CalcError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): CalcErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: CalcErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Invalid character in the user text */
export class LexerError extends CalcError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'lexer');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Malformed expression: operand/operator order or parentheses */
export class ParseError extends CalcError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Arithmetic failure while evaluating postfix tokens */
export class EvaluationError extends CalcError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    const definition = lookupDefinition(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'EvaluationError';
  }
}

/** Errors that carry a caret position in the user text */
export type SyntaxFailure = LexerError | ParseError;

export function isSyntaxFailure(err: unknown): err is SyntaxFailure {
  return err instanceof LexerError || err instanceof ParseError;
}
