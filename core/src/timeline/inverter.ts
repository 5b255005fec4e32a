import { assertValidPadding } from '../config.js';
import { createValidationError, ValidationErrorCode } from '../errors/index.js';
import { Interval, TIME_EPSILON, type SilenceReport } from './interval.js';
import { coalesceIntervals, normalizeSilenceReport } from './silence-report.js';

/**
 * Subtracts silence from `[0, totalDuration)` and pads the remaining speech.
 *
 * Each speech gap grows by `padding` on both sides, clamped to the source,
 * and neighbours that end up touching or crossing are merged. The result is
 * ordered, non-overlapping and may be empty when the whole source is silent.
 */
export function invertSilences(report: SilenceReport, totalDuration: number, padding: number): Interval[] {
  assertValidTotalDuration(totalDuration);
  assertValidPadding(padding);

  const silences = normalizeSilenceReport(report, totalDuration);
  const padded: Interval[] = [];

  let cursor = 0;
  for (const silence of silences) {
    pushPadded(padded, cursor, silence.start, totalDuration, padding);
    cursor = silence.end;
  }
  pushPadded(padded, cursor, totalDuration, totalDuration, padding);

  return coalesceIntervals(padded);
}

function pushPadded(
  target: Interval[],
  rawStart: number,
  rawEnd: number,
  totalDuration: number,
  padding: number,
): void {
  // Zero-width gaps are not speech, however much padding they would receive.
  if (rawEnd - rawStart <= TIME_EPSILON) {
    return;
  }

  let start = Math.max(0, rawStart - padding);
  let end = Math.min(totalDuration, rawEnd + padding);
  if (start <= TIME_EPSILON) {
    start = 0;
  }
  if (totalDuration - end <= TIME_EPSILON) {
    end = totalDuration;
  }

  target.push(Interval.of(start, end));
}

export function assertValidTotalDuration(totalDuration: number): void {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw createValidationError(
      ValidationErrorCode.INVALID_TOTAL_DURATION,
      `Total duration must be a positive number of seconds, got ${totalDuration}.`,
    );
  }
}
