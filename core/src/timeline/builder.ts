import type { EngineConfig } from '../config.js';
import { createRuntimeError, RuntimeErrorCode, type HushcutError } from '../errors/index.js';
import { Interval, TIME_EPSILON } from './interval.js';
import type { GaplessTimeline, Segment, SegmentRole, SparseSelection, TimelineResult } from './types.js';

export interface BuildTimelineInput {
  /** Ordered, non-overlapping speech intervals from the inverter */
  speech: readonly Interval[];
  totalDuration: number;
  config: EngineConfig;
}

/**
 * Turns speech intervals into the builder result for the configured mode.
 *
 * - Removal mode keeps only speech, at normal speed.
 * - Acceleration mode keeps every source instant: the gaps between speech
 *   become `Silence` segments at the acceleration factor.
 *
 * @throws HushcutError R001 when the produced sequence has a gap or an overlap.
 */
export function buildTimeline(input: BuildTimelineInput): TimelineResult {
  const { speech, totalDuration, config } = input;

  if (speech.length === 0) {
    return { kind: 'empty', sourceDuration: totalDuration };
  }

  if (config.accelerationFactor === undefined) {
    const segments = speech.map((interval) => createSegment(interval, 'Speech', 1));
    assertSparseSelection(segments, totalDuration);
    const selection: SparseSelection = { mode: 'removal', segments, sourceDuration: totalDuration };
    return { kind: 'selection', selection };
  }

  const factor = config.accelerationFactor;
  const segments: Segment[] = [];
  let cursor = 0;

  for (const interval of speech) {
    if (interval.start - cursor > TIME_EPSILON) {
      segments.push(createSegment(Interval.of(cursor, interval.start), 'Silence', factor));
    }
    segments.push(createSegment(interval, 'Speech', 1));
    cursor = interval.end;
  }
  if (totalDuration - cursor > TIME_EPSILON) {
    segments.push(createSegment(Interval.of(cursor, totalDuration), 'Silence', factor));
  }

  assertGaplessTimeline(segments, totalDuration);
  const timeline: GaplessTimeline = { mode: 'acceleration', segments, totalDuration };
  return { kind: 'timeline', timeline };
}

export function createSegment(
  interval: Interval,
  role: SegmentRole,
  speedFactor: number,
  blendEligible = false,
): Segment {
  return Object.freeze({ interval, role, speedFactor, blendEligible });
}

/**
 * Verifies the gapless invariant: the first segment starts at 0, each
 * segment ends exactly where the next starts, and the last ends at
 * `totalDuration` (within {@link TIME_EPSILON}).
 */
export function assertGaplessTimeline(segments: readonly Segment[], totalDuration: number): void {
  if (segments.length === 0) {
    throw inconsistent('timeline has no segments');
  }

  const first = segments[0];
  if (first.interval.start !== 0) {
    throw inconsistent(`first segment starts at ${first.interval.start}, expected 0`);
  }

  for (let index = 1; index < segments.length; index += 1) {
    const previous = segments[index - 1].interval;
    const current = segments[index].interval;
    if (current.start !== previous.end) {
      const problem = current.start > previous.end ? 'gap' : 'overlap';
      throw inconsistent(`${problem} between ${previous.toString()} and ${current.toString()}`);
    }
  }

  const last = segments[segments.length - 1];
  if (Math.abs(last.interval.end - totalDuration) > TIME_EPSILON) {
    throw inconsistent(`last segment ends at ${last.interval.end}, expected ${totalDuration}`);
  }

  assertSpeedFactors(segments);
}

/**
 * Verifies a removal-mode selection: ascending, non-overlapping, inside the
 * source, speech only.
 */
export function assertSparseSelection(segments: readonly Segment[], sourceDuration: number): void {
  for (let index = 0; index < segments.length; index += 1) {
    const segment = segments[index];
    if (segment.role !== 'Speech') {
      throw inconsistent(`selection contains a ${segment.role} segment at ${segment.interval.toString()}`);
    }
    if (segment.interval.end - sourceDuration > TIME_EPSILON) {
      throw inconsistent(`segment ${segment.interval.toString()} ends after the source (${sourceDuration})`);
    }
    const previous = index > 0 ? segments[index - 1] : undefined;
    if (previous && segment.interval.start < previous.interval.end) {
      throw inconsistent(`overlap between ${previous.interval.toString()} and ${segment.interval.toString()}`);
    }
  }
  assertSpeedFactors(segments);
}

function assertSpeedFactors(segments: readonly Segment[]): void {
  for (const segment of segments) {
    if (!(segment.speedFactor >= 1)) {
      throw inconsistent(`segment ${segment.interval.toString()} has speed factor ${segment.speedFactor}`);
    }
  }
}

function inconsistent(detail: string): HushcutError {
  return createRuntimeError(RuntimeErrorCode.INCONSISTENT_TIMELINE, `Inconsistent timeline: ${detail}.`);
}
