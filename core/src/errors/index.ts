/**
 * hushcut error system
 *
 * - V (Validation): Bad configuration or engine input
 * - R (Runtime): Internal invariant breaches
 * - T (Tool): External process failures
 * - W (Warnings): Soft warnings across all layers
 */

// Types
export type { ErrorSeverity, HushcutErrorOptions } from './types.js';
export { HushcutError, isHushcutError } from './types.js';

// Error Codes
export {
  ValidationErrorCode,
  RuntimeErrorCode,
  ToolErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ValidationErrorCodeValue,
  RuntimeErrorCodeValue,
  ToolErrorCodeValue,
  WarningCodeValue,
  ErrorCategory,
  ErrorCode,
} from './codes.js';

// Helpers
export {
  createHushcutError,
  createValidationError,
  createRuntimeError,
  createToolError,
  formatError,
} from './helpers.js';
