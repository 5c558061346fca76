/**
 * CLI Error Explanation
 * Function for rendering full error documentation
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from './types.js';

/**
 * Render full error documentation for --explain command.
 *
 * @param errorId - Error identifier (format: CALC-{category}{3-digit})
 * @returns Formatted documentation string, or null if errorId is invalid/unknown
 *
 * @example
 * explainError("CALC-R001")
 * // Returns: formatted documentation with cause, resolution, examples
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      sections.push(`    intcalc "${example.code}"`);
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
