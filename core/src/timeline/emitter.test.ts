import { describe, expect, it } from 'vitest';
import { createSegment } from './builder.js';
import { emitCutPlan, emitRenderPlan, emitSpeedPlan } from './emitter.js';
import { Interval } from './interval.js';
import type { GaplessTimeline, SparseSelection } from './types.js';

describe('emitCutPlan', () => {
  it('lists ranges in order with their summed duration', () => {
    const selection: SparseSelection = {
      mode: 'removal',
      sourceDuration: 10,
      segments: [
        createSegment(Interval.of(0, 2.5), 'Speech', 1),
        createSegment(Interval.of(4, 6), 'Speech', 1),
        createSegment(Interval.of(8, 9), 'Speech', 1),
      ],
    };

    const plan = emitCutPlan(selection);

    expect(plan).toEqual({
      mode: 'removal',
      ranges: [
        { start: 0, end: 2.5 },
        { start: 4, end: 6 },
        { start: 8, end: 9 },
      ],
      expectedDuration: 5.5,
    });
  });
});

describe('emitSpeedPlan', () => {
  const timeline: GaplessTimeline = {
    mode: 'acceleration',
    totalDuration: 6,
    segments: [
      createSegment(Interval.of(0, 2), 'Speech', 1),
      createSegment(Interval.of(2, 2.5), 'Ramp', 2, true),
      createSegment(Interval.of(2.5, 3.5), 'Silence', 4, true),
      createSegment(Interval.of(3.5, 4), 'Ramp', 2, true),
      createSegment(Interval.of(4, 6), 'Speech', 1),
    ],
  };

  it('accumulates output time as duration over speed', () => {
    const plan = emitSpeedPlan(timeline);

    expect(plan.entries.map((entry) => [entry.outputStart, entry.outputEnd])).toEqual([
      [0, 2],
      [2, 2.25],
      [2.25, 2.5],
      [2.5, 2.75],
      [2.75, 4.75],
    ]);
    expect(plan.expectedDuration).toBe(4.75);
  });

  it('carries source bounds, speed, role and blend flag per entry', () => {
    const plan = emitSpeedPlan(timeline);

    expect(plan.entries[2]).toEqual({
      sourceStart: 2.5,
      sourceEnd: 3.5,
      speedFactor: 4,
      blendEligible: true,
      outputStart: 2.25,
      outputEnd: 2.5,
      role: 'Silence',
    });
  });

  it('chains each output start to the previous output end', () => {
    const plan = emitSpeedPlan(timeline);

    for (let index = 1; index < plan.entries.length; index += 1) {
      expect(plan.entries[index].outputStart).toBe(plan.entries[index - 1].outputEnd);
    }
  });
});

describe('emitRenderPlan', () => {
  it('maps the empty outcome to an empty plan', () => {
    expect(emitRenderPlan({ kind: 'empty', sourceDuration: 3 })).toEqual({ mode: 'empty', expectedDuration: 0 });
  });

  it('dispatches a selection to the cut plan', () => {
    const plan = emitRenderPlan({
      kind: 'selection',
      selection: { mode: 'removal', sourceDuration: 3, segments: [createSegment(Interval.of(1, 2), 'Speech', 1)] },
    });

    expect(plan.mode).toBe('removal');
    expect(plan.expectedDuration).toBe(1);
  });
});
