/**
 * Runtime Module
 * Postfix conversion and evaluation
 */

export { formatPostfix, toPostfix } from './converter.js';
export { applyBinary, evaluatePostfix, MAX_RESULT_BITS } from './evaluator.js';
export { Stack } from './stack.js';
