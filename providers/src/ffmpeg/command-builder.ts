import {
  createHushcutError,
  createValidationError,
  ValidationErrorCode,
  WarningCode,
  type CutPlan,
  type RenderPlan,
} from '@hushcut/core';
import { buildConcatList } from './concat-list.js';
import { buildCutFilterGraph, buildSpeedFilterGraph, type FilterGraph } from './filter-graph.js';
import type { FfmpegCommand, RenderOptions } from './types.js';
import { RENDER_DEFAULTS } from './types.js';

export interface BuildRenderCommandOptions extends Partial<RenderOptions> {
  /** False for audio-only input (default: true) */
  hasVideo?: boolean;
}

/**
 * Build the ffmpeg invocation that renders a plan into `outputPath`.
 *
 * @throws V011 when the copy strategy is asked to retime segments
 * @throws W003 for the empty plan, which has nothing to render
 */
export function buildRenderCommand(
  plan: RenderPlan,
  inputPath: string,
  outputPath: string,
  options: BuildRenderCommandOptions = {},
): FfmpegCommand {
  const fullOptions = resolveOptions(options);
  const hasVideo = options.hasVideo ?? true;

  if (plan.mode === 'empty') {
    throw createHushcutError(WarningCode.EMPTY_TIMELINE, 'The render plan is empty; there is nothing to render.');
  }

  if (fullOptions.strategy === 'copy') {
    if (plan.mode !== 'removal') {
      throw createValidationError(
        ValidationErrorCode.INVALID_FLAG_VALUE,
        'The copy strategy cannot change playback speed.',
        { context: 'strategy copy with acceleration', suggestion: 'Use --strategy reencode with --accelerate.' },
      );
    }
    return buildCopyCommand(plan, inputPath, outputPath, fullOptions);
  }

  const graph =
    plan.mode === 'removal'
      ? buildCutFilterGraph(plan, { hasVideo, frameRate: fullOptions.frameRate })
      : buildSpeedFilterGraph(plan, { hasVideo, frameRate: fullOptions.frameRate });

  return {
    ffmpegPath: fullOptions.ffmpegPath,
    args: [
      '-y',
      '-hide_banner',
      '-i',
      inputPath,
      '-filter_complex',
      graph.filterComplex,
      ...buildOutputArgs(graph, fullOptions),
      outputPath,
    ],
    inputPath,
    outputPath,
    expectedDuration: plan.expectedDuration,
  };
}

function buildCopyCommand(
  plan: CutPlan,
  inputPath: string,
  outputPath: string,
  options: RenderOptions,
): FfmpegCommand {
  const listPath = options.concatListPath ?? `${outputPath}.ffconcat`;
  return {
    ffmpegPath: options.ffmpegPath,
    args: ['-y', '-hide_banner', '-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath],
    inputPath,
    outputPath,
    expectedDuration: plan.expectedDuration,
    concatList: { path: listPath, contents: buildConcatList(plan, inputPath) },
  };
}

function buildOutputArgs(graph: FilterGraph, options: RenderOptions): string[] {
  const args: string[] = [];

  if (graph.videoLabel) {
    args.push('-map', `[${graph.videoLabel}]`);
  }
  args.push('-map', `[${graph.audioLabel}]`);

  if (graph.videoLabel) {
    args.push('-c:v', 'libx264', '-preset', options.preset, '-crf', String(options.crf));
  }
  args.push('-c:a', 'aac', '-b:a', options.audioBitrate);

  return args;
}

function resolveOptions(options: Partial<RenderOptions>): RenderOptions {
  return {
    ffmpegPath: options.ffmpegPath ?? RENDER_DEFAULTS.ffmpegPath,
    preset: options.preset ?? RENDER_DEFAULTS.preset,
    crf: options.crf ?? RENDER_DEFAULTS.crf,
    audioBitrate: options.audioBitrate ?? RENDER_DEFAULTS.audioBitrate,
    strategy: options.strategy ?? RENDER_DEFAULTS.strategy,
    frameRate: options.frameRate ?? RENDER_DEFAULTS.frameRate,
    concatListPath: options.concatListPath,
  };
}
