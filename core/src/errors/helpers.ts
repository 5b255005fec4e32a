/**
 * Error creation helpers.
 *
 * Provides factory functions for creating coded errors with consistent
 * formatting across all error categories.
 */

import type { ErrorCode, RuntimeErrorCodeValue, ToolErrorCodeValue, ValidationErrorCodeValue } from './codes.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';
import { HushcutError, type HushcutErrorOptions } from './types.js';

/**
 * Creates a HushcutError; category and severity are inferred from the code.
 */
export function createHushcutError(
  code: ErrorCode,
  message: string,
  options: HushcutErrorOptions = {},
): HushcutError {
  return new HushcutError(code, message, getErrorCategory(code), getErrorSeverity(code), options);
}

/**
 * Creates a validation error (V-code).
 */
export function createValidationError(
  code: ValidationErrorCodeValue,
  message: string,
  options: HushcutErrorOptions = {},
): HushcutError {
  return createHushcutError(code, message, options);
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: RuntimeErrorCodeValue,
  message: string,
  options: HushcutErrorOptions = {},
): HushcutError {
  return createHushcutError(code, message, options);
}

/**
 * Creates an external tool error (T-code).
 */
export function createToolError(
  code: ToolErrorCodeValue,
  message: string,
  options: HushcutErrorOptions = {},
): HushcutError {
  return createHushcutError(code, message, options);
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a HushcutError for display.
 */
export function formatError(error: HushcutError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.context) {
    parts.push(`  Context: ${error.context}`);
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
