// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position inside a single-line expression.
 * `column` is 1-based, `offset` is the 0-based character index.
 */
export interface SourceLocation {
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function locationAt(offset: number): SourceLocation {
  return { column: offset + 1, offset };
}
