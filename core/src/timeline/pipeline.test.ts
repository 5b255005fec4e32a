import { describe, expect, it } from 'vitest';
import { createEngineConfig } from '../config.js';
import { Interval } from './interval.js';
import { planSilenceEdit } from './pipeline.js';

describe('planSilenceEdit', () => {
  it('cuts silence in removal mode', () => {
    const edit = planSilenceEdit({
      silences: [Interval.of(2, 4)],
      totalDuration: 6,
      config: createEngineConfig({ padding: 0 }),
    });

    expect(edit.speech.map((interval) => interval.toJSON())).toEqual([
      { start: 0, end: 2 },
      { start: 4, end: 6 },
    ]);
    expect(edit.plan).toEqual({
      mode: 'removal',
      ranges: [
        { start: 0, end: 2 },
        { start: 4, end: 6 },
      ],
      expectedDuration: 4,
    });
    expect(edit.stats).toEqual({
      keptDuration: 4,
      removedDuration: 2,
      outputDuration: 4,
      silenceCount: 1,
      segmentCount: 2,
    });
  });

  it('keeps padding around speech', () => {
    const edit = planSilenceEdit({
      silences: [Interval.of(2, 4)],
      totalDuration: 6,
      config: createEngineConfig({ padding: 0.5 }),
    });

    expect(edit.speech.map((interval) => interval.toJSON())).toEqual([
      { start: 0, end: 2.5 },
      { start: 3.5, end: 6 },
    ]);
  });

  it('accelerates short silence without ramps', () => {
    const edit = planSilenceEdit({
      silences: [Interval.of(2, 2.3)],
      totalDuration: 6,
      config: createEngineConfig({ padding: 0, accelerationFactor: 3, fluidTransitions: true }),
    });

    expect(edit.plan.mode).toBe('acceleration');
    if (edit.plan.mode !== 'acceleration') return;
    expect(edit.plan.entries.map((entry) => [entry.role, entry.sourceStart, entry.sourceEnd, entry.speedFactor])).toEqual([
      ['Speech', 0, 2, 1],
      ['Silence', 2, 2.3, 3],
      ['Speech', 2.3, 6, 1],
    ]);
  });

  it('ramps into and out of long accelerated silence', () => {
    const edit = planSilenceEdit({
      silences: [Interval.of(2, 3)],
      totalDuration: 6,
      config: createEngineConfig({ padding: 0, accelerationFactor: 3, fluidTransitions: true }),
    });

    if (edit.plan.mode !== 'acceleration') throw new Error(`unexpected ${edit.plan.mode}`);
    const entries = edit.plan.entries;
    expect(entries.map((entry) => [entry.role, entry.speedFactor])).toEqual([
      ['Speech', 1],
      ['Ramp', 2],
      ['Silence', 3],
      ['Ramp', 2],
      ['Speech', 1],
    ]);
    expect(entries[1].sourceStart).toBe(2);
    expect(entries[1].sourceEnd).toBeCloseTo(2.1, 9);
    expect(entries[3].sourceStart).toBeCloseTo(2.9, 9);
    expect(entries[3].sourceEnd).toBe(3);
    // 2 + 0.1/2 + 0.8/3 + 0.1/2 + 3
    expect(edit.plan.expectedDuration).toBeCloseTo(5.1 + 0.8 / 3, 9);
    expect(edit.stats.outputDuration).toBe(edit.plan.expectedDuration);
  });

  it('reports the empty outcome for a silent source', () => {
    const edit = planSilenceEdit({
      silences: [Interval.of(0, 4)],
      totalDuration: 4,
      config: createEngineConfig({ accelerationFactor: 2 }),
    });

    expect(edit.result).toEqual({ kind: 'empty', sourceDuration: 4 });
    expect(edit.plan).toEqual({ mode: 'empty', expectedDuration: 0 });
    expect(edit.stats.keptDuration).toBe(0);
    expect(edit.stats.removedDuration).toBe(4);
  });

  it('yields identical plans for identical input', () => {
    const input = {
      silences: [Interval.of(0.4, 1.9), Interval.of(3.3, 3.45), Interval.of(5, 7.25)],
      totalDuration: 8,
      config: createEngineConfig({ padding: 0.05, accelerationFactor: 2.5, fluidTransitions: true }),
    };

    const first = JSON.stringify(planSilenceEdit(input));
    const second = JSON.stringify(planSilenceEdit(input));

    expect(second).toBe(first);
  });
});
