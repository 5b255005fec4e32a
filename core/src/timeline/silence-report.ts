import { Interval, TIME_EPSILON, type SilenceReport } from './interval.js';

/**
 * Sorts, clips and coalesces a detector's silence report.
 *
 * Detectors promise ordered, non-overlapping output; this does not rely on it.
 * Intervals are clipped to `[0, totalDuration]`, those left narrower than
 * {@link TIME_EPSILON} are dropped, and overlapping or touching neighbours are
 * merged.
 */
export function normalizeSilenceReport(report: SilenceReport, totalDuration: number): Interval[] {
  const clipped: Interval[] = [];
  for (const silence of report) {
    const start = Math.max(0, silence.start);
    const end = Math.min(totalDuration, silence.end);
    if (end - start > TIME_EPSILON) {
      clipped.push(start === silence.start && end === silence.end ? silence : Interval.of(start, end));
    }
  }

  clipped.sort((a, b) => a.start - b.start || a.end - b.end);
  return coalesceIntervals(clipped);
}

/**
 * Merges sorted intervals that overlap or touch within {@link TIME_EPSILON}.
 */
export function coalesceIntervals(intervals: readonly Interval[]): Interval[] {
  const merged: Interval[] = [];
  for (const interval of intervals) {
    const previous = merged[merged.length - 1];
    if (previous && interval.start <= previous.end + TIME_EPSILON) {
      if (interval.end > previous.end) {
        merged[merged.length - 1] = Interval.of(previous.start, interval.end);
      }
    } else {
      merged.push(interval);
    }
  }
  return merged;
}
