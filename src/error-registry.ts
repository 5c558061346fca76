/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Format: CALC-{L|P|R}{3-digit} */
export const ERROR_ID_PATTERN = /^CALC-[LPR]\d{3}$/;

/**
 * Example demonstrating an error condition.
 * Used by `--explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CALC-{category}{3-digit} (e.g., CALC-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (!ERROR_ID_PATTERN.test(def.errorId)) {
        throw new TypeError(`Malformed error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (CALC-L0xx)
  {
    errorId: 'CALC-L001',
    category: 'lexer',
    description: 'Unexpected symbol',
    messageTemplate: "Unexpected symbol '{symbol}' found at position {position}.",
    cause:
      'Character is not a digit, an operator (+ - x / % ^), a parenthesis or whitespace.',
    resolution:
      'Remove the character. Multiplication is written with a lowercase x, not *.',
    examples: [
      { description: 'Asterisk used for multiplication', code: '2 * 3' },
      { description: 'Decimal point in a number', code: '1.5 + 2' },
    ],
  },

  // Parse Errors (CALC-P0xx)
  {
    errorId: 'CALC-P001',
    category: 'parse',
    description: 'Expected operator',
    messageTemplate: 'Expected operator at position {position}.',
    cause: 'Two operands follow each other with no operator between them.',
    resolution:
      'Insert an operator between the operands, or join the digits if they form one number.',
    examples: [
      { description: 'Space inside a number', code: '2 3' },
      { description: 'Number directly after a group', code: '(1 + 2)3' },
    ],
  },
  {
    errorId: 'CALC-P002',
    category: 'parse',
    description: 'Expected operand',
    messageTemplate:
      "Expected operand, but found '{symbol}' at position {position}.",
    cause:
      'A binary operator or closing parenthesis appears where a number, a negation or an opening parenthesis is required.',
    resolution: 'Supply the missing operand before the operator.',
    examples: [
      { description: 'Two binary operators in a row', code: '2 + x 3' },
      { description: 'Empty parentheses', code: '()' },
    ],
  },
  {
    errorId: 'CALC-P003',
    category: 'parse',
    description: 'Expected operator',
    messageTemplate:
      "Expected operator, but found '{symbol}' at position {position}.",
    cause: 'An opening parenthesis follows an operand with no operator.',
    resolution:
      'Insert an operator before the parenthesis. Implicit multiplication is not supported.',
    examples: [{ description: 'Implicit multiplication', code: '2(3 + 4)' }],
  },
  {
    errorId: 'CALC-P004',
    category: 'parse',
    description: "Unmatched ')'",
    messageTemplate: "Unmatched ')' found at position {position}.",
    cause: 'Closing parenthesis has no opening parenthesis before it.',
    resolution: "Remove the ')' or add the matching '(' earlier.",
    examples: [{ description: 'Extra closing parenthesis', code: '(1 + 2))' }],
  },
  {
    errorId: 'CALC-P005',
    category: 'parse',
    description: 'Missing operand',
    messageTemplate: 'Missing operand at position {position}.',
    cause: 'Expression ends with an operator or an opening parenthesis.',
    resolution: 'Complete the expression with a number.',
    examples: [{ description: 'Trailing operator', code: '1 +' }],
  },
  {
    errorId: 'CALC-P006',
    category: 'parse',
    description: "Unmatched '('",
    messageTemplate: "Unmatched '(' found at position {position}.",
    cause: 'Opening parenthesis is never closed.',
    resolution: "Add the missing ')' or remove the '('.",
    examples: [{ description: 'Unclosed group', code: '(1 + 2' }],
  },

  // Runtime Errors (CALC-R0xx)
  {
    errorId: 'CALC-R001',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Cannot evaluate expression, division by zero.',
    cause:
      'Right operand of / or % evaluated to 0, or 0 was raised to a negative power.',
    resolution: 'Change the divisor so it cannot evaluate to 0.',
    examples: [
      { description: 'Literal zero divisor', code: '10 / 0' },
      { description: 'Modulo by a zero-valued group', code: '7 % (2 - 2)' },
    ],
  },
  {
    errorId: 'CALC-R002',
    category: 'runtime',
    description: 'Zero to the zero power',
    messageTemplate: 'Cannot evaluate expression, 0^0 is undefined.',
    cause: 'Both operands of ^ evaluated to 0.',
    resolution: 'Change the base or the exponent so they are not both 0.',
    examples: [{ description: 'Literal 0^0', code: '0 ^ 0' }],
  },
  {
    errorId: 'CALC-R003',
    category: 'runtime',
    description: 'Result too large',
    messageTemplate: 'Cannot evaluate expression, result is too large.',
    cause: 'A power or product needs more than 1048576 bits.',
    resolution: 'Use a smaller exponent or split the calculation.',
    examples: [
      { description: 'Huge exponent', code: '2 ^ 99999999999' },
      { description: 'Tower of powers', code: '10 ^ 10 ^ 10' },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string, other values go through
 * String(). A template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage("Missing operand at position {position}.", { position: 4 })
 * // Returns: "Missing operand at position 4."
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
