import { describe, expect, it } from 'vitest';
import { formatTime } from './time-format.js';

describe('formatTime', () => {
  it('formats hours, minutes and milliseconds', () => {
    expect(formatTime(3725.5)).toBe('01:02:05.500');
  });

  it('pads short durations', () => {
    expect(formatTime(0)).toBe('00:00:00.000');
    expect(formatTime(9.25)).toBe('00:00:09.250');
  });

  it('rounds to the nearest millisecond', () => {
    expect(formatTime(59.9996)).toBe('00:01:00.000');
  });

  it('clamps negative values to zero', () => {
    expect(formatTime(-3)).toBe('00:00:00.000');
  });
});
