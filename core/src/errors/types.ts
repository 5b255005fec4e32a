/**
 * Shared error types for the hushcut error system.
 */

import type { ErrorCategory, ErrorCode } from './codes.js';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Options accepted when raising a coded error.
 */
export interface HushcutErrorOptions {
  /** Element context (e.g., "interval [2, 1]", "config file ./hushcut.yaml") */
  context?: string;
  /** Suggested fix (optional) */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Base error for every failure the engine and its collaborators raise.
 *
 * Category and severity are derived from the code prefix.
 */
export class HushcutError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context?: string;
  readonly suggestion?: string;

  constructor(
    code: ErrorCode,
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    options: HushcutErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'HushcutError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = options.context;
    this.suggestion = options.suggestion;
  }
}

/**
 * Type guard to check if an error is a HushcutError.
 */
export function isHushcutError(error: unknown): error is HushcutError {
  return error instanceof HushcutError;
}
