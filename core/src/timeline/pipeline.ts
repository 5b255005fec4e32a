import type { EngineConfig } from '../config.js';
import { annotateTimeline } from './annotator.js';
import { buildTimeline } from './builder.js';
import { emitRenderPlan } from './emitter.js';
import type { Interval, SilenceReport } from './interval.js';
import { invertSilences } from './inverter.js';
import type { RenderPlan, TimelineResult } from './types.js';

export interface SilenceEditInput {
  silences: SilenceReport;
  totalDuration: number;
  config: EngineConfig;
}

export interface SilenceEditStats {
  /** Source seconds played at normal speed */
  keptDuration: number;
  /** Source seconds that are not speech (removed or accelerated) */
  removedDuration: number;
  /** Duration the rendered output should have */
  outputDuration: number;
  silenceCount: number;
  segmentCount: number;
}

export interface SilenceEditPlan {
  speech: readonly Interval[];
  result: TimelineResult;
  plan: RenderPlan;
  stats: SilenceEditStats;
}

/**
 * Runs the whole engine: inverter, builder, annotator and emitter.
 *
 * Pure and synchronous; identical input always yields an identical plan.
 */
export function planSilenceEdit(input: SilenceEditInput): SilenceEditPlan {
  const { silences, totalDuration, config } = input;

  const speech = invertSilences(silences, totalDuration, config.padding);
  const built = buildTimeline({ speech, totalDuration, config });
  const result: TimelineResult =
    built.kind === 'timeline' ? { kind: 'timeline', timeline: annotateTimeline(built.timeline, config) } : built;
  const plan = emitRenderPlan(result);

  const keptDuration = speech.reduce((total, interval) => total + interval.duration, 0);

  return {
    speech,
    result,
    plan,
    stats: {
      keptDuration,
      removedDuration: Math.max(0, totalDuration - keptDuration),
      outputDuration: plan.expectedDuration,
      silenceCount: silences.length,
      segmentCount: countSegments(result),
    },
  };
}

function countSegments(result: TimelineResult): number {
  switch (result.kind) {
    case 'empty':
      return 0;
    case 'selection':
      return result.selection.segments.length;
    case 'timeline':
      return result.timeline.segments.length;
  }
}
