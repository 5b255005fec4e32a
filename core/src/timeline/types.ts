import type { Interval, IntervalJson } from './interval.js';

/**
 * What a segment holds. Ramps are the short transitions inserted around
 * accelerated silence.
 */
export type SegmentRole = 'Speech' | 'Silence' | 'Ramp';

/**
 * Atomic unit of a render plan: one source interval played at one speed.
 *
 * Timestamps are in the source timeline; the renderer maps them to output
 * time with `speedFactor`.
 */
export interface Segment {
  readonly interval: Interval;
  /** 1.0 = unchanged; never below 1.0 */
  readonly speedFactor: number;
  readonly role: SegmentRole;
  /** Only ever true for non-speech segments faster than the blend threshold */
  readonly blendEligible: boolean;
}

/**
 * Removal-mode builder output: the retained speech, in order, with gaps
 * where silence was dropped. Does not cover the whole source.
 */
export interface SparseSelection {
  readonly mode: 'removal';
  readonly segments: readonly Segment[];
  /** Duration of the source the selection was taken from */
  readonly sourceDuration: number;
}

/**
 * Acceleration-mode builder output: covers `[0, totalDuration)` with no gaps
 * and no overlaps.
 */
export interface GaplessTimeline {
  readonly mode: 'acceleration';
  readonly segments: readonly Segment[];
  readonly totalDuration: number;
}

/**
 * Builder outcome. `empty` is the explicit "nothing to keep" result for a
 * source with no speech; callers skip rendering.
 */
export type TimelineResult =
  | { readonly kind: 'empty'; readonly sourceDuration: number }
  | { readonly kind: 'selection'; readonly selection: SparseSelection }
  | { readonly kind: 'timeline'; readonly timeline: GaplessTimeline };

/**
 * A range the renderer extracts and concatenates, in removal mode.
 */
export type CutRange = IntervalJson;

export interface CutPlan {
  readonly mode: 'removal';
  readonly ranges: readonly CutRange[];
  /** Sum of range durations; used to sanity-check the rendered output */
  readonly expectedDuration: number;
}

/**
 * One acceleration-mode instruction. Output timing is the single source of
 * truth shared by the audio and video transformations.
 */
export interface SpeedPlanEntry {
  readonly sourceStart: number;
  readonly sourceEnd: number;
  readonly speedFactor: number;
  readonly blendEligible: boolean;
  readonly outputStart: number;
  readonly outputEnd: number;
  readonly role: SegmentRole;
}

export interface SpeedPlan {
  readonly mode: 'acceleration';
  readonly entries: readonly SpeedPlanEntry[];
  readonly expectedDuration: number;
}

export interface EmptyPlan {
  readonly mode: 'empty';
  readonly expectedDuration: 0;
}

export type RenderPlan = CutPlan | SpeedPlan | EmptyPlan;
