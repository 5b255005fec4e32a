import type {
  CutPlan,
  GaplessTimeline,
  RenderPlan,
  SparseSelection,
  SpeedPlan,
  SpeedPlanEntry,
  TimelineResult,
} from './types.js';

/**
 * Removal mode: ascending `[start, end)` ranges to extract and concatenate,
 * plus the output duration they add up to.
 */
export function emitCutPlan(selection: SparseSelection): CutPlan {
  const ranges = selection.segments.map((segment) => segment.interval.toJSON());
  const expectedDuration = ranges.reduce((total, range) => total + (range.end - range.start), 0);
  return { mode: 'removal', ranges, expectedDuration };
}

/**
 * Acceleration mode: one entry per segment with its output-timeline position.
 *
 * Output time advances by `duration / speedFactor` per segment. Audio and
 * video renderers both read these values, so the two tracks land on the same
 * output timestamps.
 */
export function emitSpeedPlan(timeline: GaplessTimeline): SpeedPlan {
  const entries: SpeedPlanEntry[] = [];
  let outputCursor = 0;

  for (const segment of timeline.segments) {
    const { start, end } = segment.interval;
    const outputStart = outputCursor;
    const outputEnd = outputStart + (end - start) / segment.speedFactor;
    entries.push({
      sourceStart: start,
      sourceEnd: end,
      speedFactor: segment.speedFactor,
      blendEligible: segment.blendEligible,
      outputStart,
      outputEnd,
      role: segment.role,
    });
    outputCursor = outputEnd;
  }

  return { mode: 'acceleration', entries, expectedDuration: outputCursor };
}

export function emitRenderPlan(result: TimelineResult): RenderPlan {
  switch (result.kind) {
    case 'empty':
      return { mode: 'empty', expectedDuration: 0 };
    case 'selection':
      return emitCutPlan(result.selection);
    case 'timeline':
      return emitSpeedPlan(result.timeline);
  }
}
