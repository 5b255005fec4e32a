import { createValidationError, ValidationErrorCode } from '../errors/index.js';

/**
 * Tolerance, in seconds, for every equality or ordering comparison on
 * interval boundaries.
 */
export const TIME_EPSILON = 1e-6;

/**
 * Plain-data view of an interval, as serialised into plans and JSON.
 */
export interface IntervalJson {
  start: number;
  end: number;
}

/**
 * Immutable half-open time interval `[start, end)` in seconds.
 *
 * Used for silence and speech alike. All transformations return new values.
 */
export class Interval {
  readonly start: number;
  readonly end: number;

  private constructor(start: number, end: number) {
    this.start = start;
    this.end = end;
    Object.freeze(this);
  }

  /**
   * Creates an interval.
   *
   * @throws HushcutError V001 when a bound is not finite, `start < 0` or `end <= start`.
   */
  static of(start: number, end: number): Interval {
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw createValidationError(
        ValidationErrorCode.INVALID_INTERVAL,
        `Interval bounds must be finite numbers (got start=${start}, end=${end}).`,
        { context: `interval [${start}, ${end})` },
      );
    }
    if (start < 0) {
      throw createValidationError(
        ValidationErrorCode.INVALID_INTERVAL,
        `Interval start must be non-negative (got ${start}).`,
        { context: `interval [${start}, ${end})` },
      );
    }
    if (end <= start) {
      throw createValidationError(
        ValidationErrorCode.INVALID_INTERVAL,
        `Interval end must be greater than its start (got start=${start}, end=${end}).`,
        { context: `interval [${start}, ${end})` },
      );
    }
    return new Interval(start, end);
  }

  get duration(): number {
    return this.end - this.start;
  }

  /**
   * True when the two intervals share more than {@link TIME_EPSILON} of time.
   */
  overlaps(other: Interval): boolean {
    return Math.min(this.end, other.end) - Math.max(this.start, other.start) > TIME_EPSILON;
  }

  intersect(other: Interval): Interval | undefined {
    if (!this.overlaps(other)) {
      return undefined;
    }
    return new Interval(Math.max(this.start, other.start), Math.min(this.end, other.end));
  }

  contains(time: number): boolean {
    return time >= this.start && time < this.end;
  }

  equals(other: Interval): boolean {
    return (
      Math.abs(this.start - other.start) <= TIME_EPSILON &&
      Math.abs(this.end - other.end) <= TIME_EPSILON
    );
  }

  toJSON(): IntervalJson {
    return { start: this.start, end: this.end };
  }

  toString(): string {
    return `[${this.start}, ${this.end})`;
  }
}

/**
 * Ordered sequence of silence intervals as reported by a detector.
 */
export type SilenceReport = readonly Interval[];
