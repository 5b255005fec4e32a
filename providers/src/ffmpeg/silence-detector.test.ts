import { describe, expect, it, vi } from 'vitest';
import { createEngineConfig } from '@hushcut/core';
import { captureHushcutErrorAsync } from '@hushcut/core/testing';
import { ProcessFailure, type ProcessRunner } from './process-runner.js';
import {
  buildSilenceDetectArgs,
  FfmpegSilenceDetector,
  parseDurationHeader,
  parseSilenceDetectOutput,
} from './silence-detector.js';

const SAMPLE_STDERR = [
  "Input #0, mov,mp4,m4a,3gp,3g2,mj2, from 'talk.mp4':",
  '  Duration: 00:00:08.00, start: 0.000000, bitrate: 512 kb/s',
  '[silencedetect @ 0x5581] silence_start: 1.5',
  '[silencedetect @ 0x5581] silence_end: 3.2 | silence_duration: 1.7',
  '[silencedetect @ 0x5581] silence_start: 5',
  '[silencedetect @ 0x5581] silence_end: 6.5 | silence_duration: 1.5',
].join('\n');

function toPairs(stderr: string): Array<[number, number]> {
  return parseSilenceDetectOutput(stderr).map((interval) => [interval.start, interval.end]);
}

describe('buildSilenceDetectArgs', () => {
  it('passes threshold and minimum duration to silencedetect', () => {
    const config = createEngineConfig({ threshold: -35, minSilenceDuration: 0.75 });

    expect(buildSilenceDetectArgs('talk.mp4', config)).toEqual([
      '-hide_banner',
      '-nostats',
      '-i',
      'talk.mp4',
      '-af',
      'silencedetect=noise=-35dB:d=0.75',
      '-f',
      'null',
      '-',
    ]);
  });
});

describe('parseSilenceDetectOutput', () => {
  it('pairs starts with ends', () => {
    expect(toPairs(SAMPLE_STDERR)).toEqual([
      [1.5, 3.2],
      [5, 6.5],
    ]);
  });

  it('clamps a negative start to zero', () => {
    const stderr = [
      '[silencedetect @ 0x1] silence_start: -0.0213',
      '[silencedetect @ 0x1] silence_end: 0.9 | silence_duration: 0.92',
    ].join('\n');

    expect(toPairs(stderr)).toEqual([[0, 0.9]]);
  });

  it('reads starts printed in exponent notation', () => {
    const stderr = [
      '[silencedetect @ 0x1] silence_start: 5e-05',
      '[silencedetect @ 0x1] silence_end: 2.5 | silence_duration: 2.49995',
      '[silencedetect @ 0x1] silence_start: 4.25',
      '[silencedetect @ 0x1] silence_end: 5 | silence_duration: 0.75',
    ].join('\n');

    expect(toPairs(stderr)).toEqual([
      [0.00005, 2.5],
      [4.25, 5],
    ]);
  });

  it('clamps a negative exponent-notation start to zero', () => {
    const stderr = [
      '[silencedetect @ 0x1] silence_start: -1.2e-05',
      '[silencedetect @ 0x1] silence_end: 1.5 | silence_duration: 1.50001',
    ].join('\n');

    expect(toPairs(stderr)).toEqual([[0, 1.5]]);
  });

  it('closes a trailing start at the header duration', () => {
    const stderr = `${SAMPLE_STDERR}\n[silencedetect @ 0x5581] silence_start: 7.25`;

    expect(toPairs(stderr)).toEqual([
      [1.5, 3.2],
      [5, 6.5],
      [7.25, 8],
    ]);
  });

  it('drops a trailing start when no duration was printed', () => {
    expect(toPairs('[silencedetect @ 0x1] silence_start: 2.5')).toEqual([]);
  });

  it('ignores ends without a start and unrelated lines', () => {
    const stderr = [
      '[silencedetect @ 0x1] silence_end: 1.0 | silence_duration: 1.0',
      'frame=  100 fps=0.0 q=-0.0 size=N/A time=00:00:04.00',
    ].join('\n');

    expect(toPairs(stderr)).toEqual([]);
  });

  it('skips zero-width entries', () => {
    const stderr = [
      '[silencedetect @ 0x1] silence_start: 4',
      '[silencedetect @ 0x1] silence_end: 4 | silence_duration: 0',
    ].join('\n');

    expect(toPairs(stderr)).toEqual([]);
  });
});

describe('parseDurationHeader', () => {
  it('reads hours, minutes and fractional seconds', () => {
    expect(parseDurationHeader('  Duration: 01:02:03.50, start: 0.0')).toBe(3723.5);
  });

  it('returns undefined without a header', () => {
    expect(parseDurationHeader('nothing here')).toBeUndefined();
  });
});

describe('FfmpegSilenceDetector', () => {
  it('runs ffmpeg and returns the parsed report', async () => {
    const runner = vi.fn<ProcessRunner>(async () => ({ stdout: '', stderr: SAMPLE_STDERR }));
    const info = vi.fn();
    const detector = new FfmpegSilenceDetector({ ffmpegPath: '/opt/ffmpeg', runner });

    const report = await detector.detect('talk.mp4', createEngineConfig(), { logger: { info } });

    expect(detector.kind).toBe('ffmpeg');
    expect(report.map((interval) => interval.toJSON())).toEqual([
      { start: 1.5, end: 3.2 },
      { start: 5, end: 6.5 },
    ]);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner.mock.calls[0]?.[0]).toBe('/opt/ffmpeg');
    expect(info).toHaveBeenCalledWith('detector.silence.end', { inputPath: 'talk.mp4', silenceCount: 2 });
  });

  it('maps a missing binary to T001', async () => {
    const runner: ProcessRunner = async () => {
      throw new ProcessFailure('spawn ffmpeg ENOENT', { errno: 'ENOENT', stderr: '', aborted: false });
    };
    const detector = new FfmpegSilenceDetector({ runner });

    const error = await captureHushcutErrorAsync(() => detector.detect('talk.mp4', createEngineConfig()));

    expect(error.code).toBe('T001');
  });

  it('maps other failures to T002 with stderr attached', async () => {
    const runner: ProcessRunner = async () => {
      throw new ProcessFailure('Command failed', {
        exitCode: 1,
        stderr: 'talk.mp4: Invalid data found when processing input',
        aborted: false,
      });
    };
    const detector = new FfmpegSilenceDetector({ runner });

    const error = await captureHushcutErrorAsync(() => detector.detect('talk.mp4', createEngineConfig()));

    expect(error.code).toBe('T002');
    expect(error.message).toBe(
      'Silence detection failed. Exit code: 1\nstderr:\ntalk.mp4: Invalid data found when processing input',
    );
  });
});
