export { Interval, TIME_EPSILON } from './interval.js';
export type { IntervalJson, SilenceReport } from './interval.js';
export { normalizeSilenceReport, coalesceIntervals } from './silence-report.js';
export { invertSilences, assertValidTotalDuration } from './inverter.js';
export {
  buildTimeline,
  createSegment,
  assertGaplessTimeline,
  assertSparseSelection,
} from './builder.js';
export type { BuildTimelineInput } from './builder.js';
export { annotateTimeline, RAMP_DURATION, BLEND_SPEED_THRESHOLD } from './annotator.js';
export { emitCutPlan, emitSpeedPlan, emitRenderPlan } from './emitter.js';
export { planSilenceEdit } from './pipeline.js';
export type { SilenceEditInput, SilenceEditPlan, SilenceEditStats } from './pipeline.js';
export type {
  SegmentRole,
  Segment,
  SparseSelection,
  GaplessTimeline,
  TimelineResult,
  CutRange,
  CutPlan,
  SpeedPlanEntry,
  SpeedPlan,
  EmptyPlan,
  RenderPlan,
} from './types.js';
