/**
 * Parser Module
 * Grammar checks over the token sequence
 */

export { assertValid, validate, type ValidationResult } from './validator.js';
