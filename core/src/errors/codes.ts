/**
 * Unified error code constants for hushcut.
 *
 * Code format: {Category}{Number}
 * - V: Validation errors (V001-V099)
 * - R: Runtime invariant breaches (R001-R099)
 * - T: External tool errors (T001-T099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V001-V009: Engine inputs
  INVALID_INTERVAL: 'V001',
  INVALID_THRESHOLD: 'V002',
  INVALID_MIN_SILENCE_DURATION: 'V003',
  INVALID_PADDING: 'V004',
  INVALID_ACCELERATION_FACTOR: 'V005',
  INVALID_TOTAL_DURATION: 'V006',

  // V010-V019: Configuration files and flags
  INVALID_CONFIG_FILE: 'V010',
  INVALID_FLAG_VALUE: 'V011',
  MISSING_INPUT_FILE: 'V012',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  INCONSISTENT_TIMELINE: 'R001',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// External Tool Error Codes (T001-T099)
// =============================================================================

export const ToolErrorCode = {
  // T001-T009: FFmpeg invocation
  FFMPEG_NOT_FOUND: 'T001',
  DETECTION_FAILED: 'T002',
  PROBE_FAILED: 'T003',
  RENDER_FAILED: 'T004',
  RENDER_CANCELLED: 'T005',
  INPUT_NOT_FOUND: 'T006',
} as const;

export type ToolErrorCodeValue = (typeof ToolErrorCode)[keyof typeof ToolErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  OUTPUT_DURATION_MISMATCH: 'W001',
  NO_SILENCE_DETECTED: 'W002',
  EMPTY_TIMELINE: 'W003',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ValidationErrorCodeValue
  | RuntimeErrorCodeValue
  | ToolErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  V: 'validation',
  R: 'runtime',
  T: 'tool',
  W: 'validation',
} as const;

export type ErrorCategory = (typeof ERROR_CODE_CATEGORIES)[keyof typeof ERROR_CODE_CATEGORIES];

function isCategoryPrefix(prefix: string): prefix is keyof typeof ERROR_CODE_CATEGORIES {
  return prefix in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): ErrorCategory {
  const prefix = code.charAt(0);
  return isCategoryPrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
