import { describe, expect, it } from 'vitest';
import { Interval } from './interval.js';
import { invertSilences } from './inverter.js';
import { normalizeSilenceReport } from './silence-report.js';
import { captureHushcutError } from '../testing/capture-error.js';

function bounds(intervals: readonly Interval[]): Array<[number, number]> {
  return intervals.map((interval) => [interval.start, interval.end]);
}

describe('normalizeSilenceReport', () => {
  it('sorts, clips and merges overlapping silence', () => {
    const report = [Interval.of(5, 7), Interval.of(1, 3), Interval.of(2.5, 4), Interval.of(9, 12)];

    const normalized = normalizeSilenceReport(report, 10);

    expect(bounds(normalized)).toEqual([
      [1, 4],
      [5, 7],
      [9, 10],
    ]);
  });

  it('merges touching silence and drops silence beyond the source', () => {
    const report = [Interval.of(1, 2), Interval.of(2, 3), Interval.of(11, 12)];

    expect(bounds(normalizeSilenceReport(report, 10))).toEqual([[1, 3]]);
  });

  it('keeps a contained interval from shrinking its container', () => {
    const report = [Interval.of(1, 5), Interval.of(2, 3)];

    expect(bounds(normalizeSilenceReport(report, 10))).toEqual([[1, 5]]);
  });
});

describe('invertSilences', () => {
  it('returns the gaps around a single silence without padding', () => {
    const speech = invertSilences([Interval.of(2, 4)], 6, 0);

    expect(bounds(speech)).toEqual([
      [0, 2],
      [4, 6],
    ]);
  });

  it('pads speech into the silence and clamps to the source', () => {
    const speech = invertSilences([Interval.of(2, 4)], 6, 0.5);

    expect(bounds(speech)).toEqual([
      [0, 2.5],
      [3.5, 6],
    ]);
  });

  it('keeps short speech islands between close silences', () => {
    const speech = invertSilences([Interval.of(1, 2), Interval.of(2.1, 3)], 5, 0.2);

    expect(speech).toHaveLength(3);
    expect(speech[0].start).toBeCloseTo(0);
    expect(speech[0].end).toBeCloseTo(1.2);
    expect(speech[1].start).toBeCloseTo(1.8);
    expect(speech[1].end).toBeCloseTo(2.3);
    expect(speech[2].start).toBeCloseTo(2.8);
    expect(speech[2].end).toBeCloseTo(5);
  });

  it('merges neighbours when padding swallows the silence between them', () => {
    const speech = invertSilences([Interval.of(2, 2.6)], 6, 0.5);

    expect(bounds(speech)).toEqual([[0, 6]]);
  });

  it('emits no leading speech for silence at time 0', () => {
    const speech = invertSilences([Interval.of(0, 1)], 4, 0);

    expect(bounds(speech)).toEqual([[1, 4]]);
  });

  it('emits no trailing speech for silence reaching the end', () => {
    const speech = invertSilences([Interval.of(3, 4)], 4, 0);

    expect(bounds(speech)).toEqual([[0, 3]]);
  });

  it('returns everything when nothing is silent', () => {
    expect(bounds(invertSilences([], 8, 0.1))).toEqual([[0, 8]]);
  });

  it('returns nothing when the whole source is silent', () => {
    expect(invertSilences([Interval.of(0, 8)], 8, 0.3)).toEqual([]);
  });

  it('tolerates unsorted, overlapping reports', () => {
    const speech = invertSilences([Interval.of(5, 6), Interval.of(1, 2), Interval.of(1.5, 3)], 8, 0);

    expect(bounds(speech)).toEqual([
      [0, 1],
      [3, 5],
      [6, 8],
    ]);
  });

  it('produces ordered, non-overlapping, positive-width intervals', () => {
    const report = [0.3, 1.1, 1.9, 2.4, 3.8, 5.05, 6.6].map((start, index) => Interval.of(start, start + 0.2 + index * 0.05));

    for (const padding of [0, 0.05, 0.1, 0.25, 0.6]) {
      const speech = invertSilences(report, 7.5, padding);
      for (let index = 0; index < speech.length; index += 1) {
        expect(speech[index].duration).toBeGreaterThan(0);
        if (index > 0) {
          expect(speech[index].start).toBeGreaterThan(speech[index - 1].end);
        }
      }
    }
  });

  it('rejects a non-positive total duration', () => {
    expect(captureHushcutError(() => invertSilences([], 0, 0)).code).toBe('V006');
  });

  it('rejects negative padding', () => {
    expect(captureHushcutError(() => invertSilences([], 5, -1)).code).toBe('V004');
  });
});
