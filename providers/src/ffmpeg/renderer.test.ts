import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { CutPlan } from '@hushcut/core';
import { captureHushcutErrorAsync } from '@hushcut/core/testing';
import { ProcessFailure, type ProcessRunner } from './process-runner.js';
import { createProgressTracker, parseFfmpegProgressLine, renderPlan } from './renderer.js';
import type { RenderProgress } from './types.js';

const PLAN: CutPlan = {
  mode: 'removal',
  ranges: [
    { start: 0, end: 4 },
    { start: 6, end: 10 },
  ],
  expectedDuration: 8,
};

function fakeRunner(options: { stderrLines?: string[]; probedDuration: string }): ProcessRunner {
  return async (command, _args, runOptions) => {
    if (command === 'ffprobe') {
      return { stdout: options.probedDuration, stderr: '' };
    }
    const stderr = (options.stderrLines ?? []).map((line) => `${line}\r`).join('');
    runOptions?.onStderr?.(stderr);
    return { stdout: '', stderr };
  };
}

describe('parseFfmpegProgressLine', () => {
  it('parses time, fps and speed', () => {
    expect(parseFfmpegProgressLine('frame=  120 fps= 60 q=28.0 size=512kB time=00:01:02.50 bitrate=N/A speed=2.5x')).toEqual({
      timeSeconds: 62.5,
      fps: 60,
      speed: 2.5,
    });
  });

  it('ignores lines without a timestamp', () => {
    expect(parseFfmpegProgressLine('Press [q] to stop')).toBeNull();
  });
});

describe('createProgressTracker', () => {
  it('reports in steps and finishes at 100', () => {
    const reported: number[] = [];
    const tracker = createProgressTracker(10, (progress) => reported.push(progress.percent));

    tracker.consume('time=00:00:00.20\rtime=00:00:00.40\rtime=00:00:01.00\r');
    tracker.consume('time=00:00:0');
    tracker.consume('5.00\rtime=00:00:10.00\rtime=00:00:10.00\r');

    expect(reported).toEqual([2, 10, 50, 100]);
  });
});

describe('renderPlan', () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('renders and reports no warnings when durations match', async () => {
    const progress: RenderProgress[] = [];
    const runner = fakeRunner({
      stderrLines: ['time=00:00:04.00 speed=4.0x', 'time=00:00:08.00 speed=4.0x'],
      probedDuration: '8.2',
    });

    const result = await renderPlan(PLAN, 'in.mp4', 'out.mp4', {
      runner,
      onProgress: (update) => progress.push(update),
    });

    expect(result).toEqual({ outputPath: 'out.mp4', expectedDuration: 8, actualDuration: 8.2, warnings: [] });
    expect(progress.map((update) => update.percent)).toEqual([50, 100]);
  });

  it('warns when the output duration drifts beyond the tolerance', async () => {
    const info = vi.fn();

    const result = await renderPlan(PLAN, 'in.mp4', 'out.mp4', {
      runner: fakeRunner({ probedDuration: '9' }),
      logger: { info },
    });

    expect(result.warnings.map((warning) => warning.code)).toEqual(['W001']);
    expect(result.warnings[0]?.message).toBe('Rendered duration 00:00:09.000 differs from the planned 00:00:08.000.');
    expect(info).toHaveBeenLastCalledWith('renderer.end', { outputPath: 'out.mp4', actualDuration: 9, warningCount: 1 });
  });

  it('accepts a custom tolerance', async () => {
    const result = await renderPlan(PLAN, 'in.mp4', 'out.mp4', {
      runner: fakeRunner({ probedDuration: '9' }),
      durationTolerance: 1.5,
    });

    expect(result.warnings).toEqual([]);
  });

  it('writes the concat list for the copy strategy and removes it afterwards', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'hushcut-render-'));
    const listPath = path.join(tempDir, 'segments.ffconcat');
    let listDuringRun = '';
    const runner: ProcessRunner = async (command) => {
      if (command === 'ffprobe') {
        return { stdout: '8', stderr: '' };
      }
      listDuringRun = await readFile(listPath, 'utf8');
      return { stdout: '', stderr: '' };
    };

    await renderPlan(PLAN, 'in.mp4', path.join(tempDir, 'out.mp4'), {
      runner,
      strategy: 'copy',
      concatListPath: listPath,
    });

    expect(listDuringRun.split('\n').slice(0, 4)).toEqual(['ffconcat version 1.0', "file 'in.mp4'", 'inpoint 0', 'outpoint 4']);
    await expect(readFile(listPath, 'utf8')).rejects.toThrow();
  });

  it('maps a failed render to T004', async () => {
    const runner: ProcessRunner = async () => {
      throw new ProcessFailure('Command failed', { exitCode: 1, stderr: 'Conversion failed!', aborted: false });
    };

    const error = await captureHushcutErrorAsync(() => renderPlan(PLAN, 'in.mp4', 'out.mp4', { runner }));

    expect(error.code).toBe('T004');
    expect(error.message).toBe('FFmpeg render failed. Exit code: 1\nstderr:\nConversion failed!');
  });

  it('maps an aborted render to T005', async () => {
    const runner: ProcessRunner = async () => {
      throw new ProcessFailure('The operation was aborted', { stderr: '', aborted: true });
    };

    const error = await captureHushcutErrorAsync(() => renderPlan(PLAN, 'in.mp4', 'out.mp4', { runner }));

    expect(error.code).toBe('T005');
  });
});
