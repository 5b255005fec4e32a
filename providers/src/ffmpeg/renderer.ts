import { rm, writeFile } from 'node:fs/promises';
import {
  createHushcutError,
  formatTime,
  ToolErrorCode,
  WarningCode,
  type HushcutError,
  type Logger,
  type RenderPlan,
} from '@hushcut/core';
import { buildRenderCommand, type BuildRenderCommandOptions } from './command-builder.js';
import { probeDuration } from './probe.js';
import { execFileRunner, toToolError, type ProcessRunner } from './process-runner.js';
import type { FfmpegProgressSnapshot, RenderProgress } from './types.js';

/** Allowed gap between planned and rendered duration, in seconds. */
export const DEFAULT_DURATION_TOLERANCE = 0.5;

const PROGRESS_STEP_PERCENT = 5;

export interface RenderPlanOptions extends BuildRenderCommandOptions {
  ffprobePath?: string;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
  onProgress?: (progress: RenderProgress) => void;
  durationTolerance?: number;
}

export interface RenderResult {
  outputPath: string;
  expectedDuration: number;
  /** Probed duration of the written file, when it could be read */
  actualDuration?: number;
  warnings: HushcutError[];
}

/**
 * Render a plan with ffmpeg, then check the output duration against the
 * plan's expectation. Mismatches come back as W001 warnings for the caller
 * to report.
 */
export async function renderPlan(
  plan: RenderPlan,
  inputPath: string,
  outputPath: string,
  options: RenderPlanOptions = {},
): Promise<RenderResult> {
  const {
    runner = execFileRunner,
    signal,
    logger = {},
    onProgress,
    durationTolerance = DEFAULT_DURATION_TOLERANCE,
  } = options;
  const command = buildRenderCommand(plan, inputPath, outputPath, options);

  logger.info?.('renderer.start', {
    inputPath,
    outputPath,
    mode: plan.mode,
    expectedDuration: command.expectedDuration,
  });
  logger.debug?.('renderer.command', { ffmpegPath: command.ffmpegPath, args: command.args });

  const progress = createProgressTracker(command.expectedDuration, (update) => {
    logger.debug?.('renderer.progress', { percent: update.percent });
    onProgress?.(update);
  });

  try {
    if (command.concatList) {
      await writeFile(command.concatList.path, command.concatList.contents, 'utf8');
    }
    await runner(command.ffmpegPath, command.args, { signal, onStderr: progress.consume });
  } catch (error) {
    throw toToolError(error, {
      binary: command.ffmpegPath,
      code: ToolErrorCode.RENDER_FAILED,
      action: 'FFmpeg render',
      inputPath,
    });
  } finally {
    if (command.concatList) {
      await rm(command.concatList.path, { force: true });
    }
  }

  const warnings: HushcutError[] = [];
  let actualDuration: number | undefined;
  try {
    actualDuration = await probeDuration(outputPath, {
      ffprobePath: options.ffprobePath,
      runner,
      signal,
    });
  } catch (error) {
    warnings.push(
      createHushcutError(WarningCode.OUTPUT_DURATION_MISMATCH, `Could not verify the duration of '${outputPath}'.`, {
        cause: error,
      }),
    );
  }

  if (actualDuration !== undefined && Math.abs(actualDuration - command.expectedDuration) > durationTolerance) {
    warnings.push(
      createHushcutError(
        WarningCode.OUTPUT_DURATION_MISMATCH,
        `Rendered duration ${formatTime(actualDuration)} differs from the planned ${formatTime(command.expectedDuration)}.`,
        { context: `tolerance ${durationTolerance}s` },
      ),
    );
  }

  logger.info?.('renderer.end', { outputPath, actualDuration, warningCount: warnings.length });

  return { outputPath, expectedDuration: command.expectedDuration, actualDuration, warnings };
}

/**
 * Feeds stderr chunks through a line buffer and reports progress whenever it
 * crosses the next step.
 */
export function createProgressTracker(
  totalSeconds: number,
  report: (progress: RenderProgress) => void,
): { consume: (chunk: string) => void } {
  let lineBuffer = '';
  let lastReported = -PROGRESS_STEP_PERCENT;

  const consume = (chunk: string): void => {
    lineBuffer += chunk;
    const lines = lineBuffer.split(/\r?\n|\r/g);
    lineBuffer = lines.pop() ?? '';

    for (const line of lines) {
      const snapshot = parseFfmpegProgressLine(line);
      if (!snapshot || totalSeconds <= 0) {
        continue;
      }
      const percent = Math.min(100, Math.floor((snapshot.timeSeconds / totalSeconds) * 100));
      if (percent - lastReported < PROGRESS_STEP_PERCENT && percent < 100) {
        continue;
      }
      if (percent === lastReported) {
        continue;
      }
      lastReported = percent;
      report({ percent, renderedSeconds: snapshot.timeSeconds, totalSeconds, snapshot });
    }
  };

  return { consume };
}

export function parseFfmpegProgressLine(line: string): FfmpegProgressSnapshot | null {
  const timeMatch = line.match(/time=(\d{2}):(\d{2}):(\d{2}(?:\.\d+)?)/);
  if (!timeMatch) {
    return null;
  }

  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = Number(timeMatch[3]);
  const timeSeconds = hours * 3600 + minutes * 60 + seconds;

  const fpsMatch = line.match(/fps=\s*([0-9.]+)/);
  const speedMatch = line.match(/speed=\s*([0-9.]+)x/);

  return {
    timeSeconds,
    fps: fpsMatch ? Number(fpsMatch[1]) : null,
    speed: speedMatch ? Number(speedMatch[1]) : null,
  };
}
