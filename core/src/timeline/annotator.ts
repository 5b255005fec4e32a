import type { EngineConfig } from '../config.js';
import { Interval, TIME_EPSILON } from './interval.js';
import { assertGaplessTimeline, createSegment } from './builder.js';
import type { GaplessTimeline, Segment } from './types.js';

/** Length of each transition ramp, in source seconds. */
export const RAMP_DURATION = 0.1;

/** Segments at or below this speed are not worth frame-blending. */
export const BLEND_SPEED_THRESHOLD = 1.05;

/**
 * Inserts speed ramps around accelerated silence and flags segments for
 * temporal frame-blending.
 *
 * Only applies when acceleration is configured with fluid transitions;
 * otherwise the timeline is returned untouched. A silence longer than two
 * ramps becomes `Ramp | Silence | Ramp`, the ramps running at the midpoint
 * between normal speed and the acceleration factor. Shorter silence stays
 * whole.
 */
export function annotateTimeline(timeline: GaplessTimeline, config: EngineConfig): GaplessTimeline {
  const factor = config.accelerationFactor;
  if (factor === undefined || !config.fluidTransitions) {
    return timeline;
  }

  const midSpeed = (1 + factor) / 2;
  const segments: Segment[] = [];

  for (const segment of timeline.segments) {
    if (segment.role === 'Silence' && canRamp(segment)) {
      segments.push(...splitWithRamps(segment, midSpeed));
    } else {
      segments.push(withBlendFlag(segment));
    }
  }

  assertGaplessTimeline(segments, timeline.totalDuration);
  return { mode: 'acceleration', segments, totalDuration: timeline.totalDuration };
}

/**
 * The core segment must keep a positive width, so a silence of exactly two
 * ramps is left whole.
 */
function canRamp(segment: Segment): boolean {
  return segment.interval.duration - 2 * RAMP_DURATION > TIME_EPSILON;
}

function splitWithRamps(segment: Segment, midSpeed: number): Segment[] {
  const { start, end } = segment.interval;
  const coreStart = start + RAMP_DURATION;
  // Derived from the parent end so the three pieces tile it exactly.
  const coreEnd = end - RAMP_DURATION;

  return [
    withBlendFlag(createSegment(Interval.of(start, coreStart), 'Ramp', midSpeed)),
    withBlendFlag(createSegment(Interval.of(coreStart, coreEnd), 'Silence', segment.speedFactor)),
    withBlendFlag(createSegment(Interval.of(coreEnd, end), 'Ramp', midSpeed)),
  ];
}

function withBlendFlag(segment: Segment): Segment {
  const blendEligible = segment.role !== 'Speech' && segment.speedFactor > BLEND_SPEED_THRESHOLD;
  if (blendEligible === segment.blendEligible) {
    return segment;
  }
  return createSegment(segment.interval, segment.role, segment.speedFactor, blendEligible);
}
