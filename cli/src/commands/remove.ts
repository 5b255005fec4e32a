import process from 'node:process';
import { access, stat, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  createEngineConfig,
  createHushcutError,
  createValidationError,
  formatError,
  planSilenceEdit,
  resolveToolPaths,
  ValidationErrorCode,
  WarningCode,
  type DetectorSelection,
  type EngineConfig,
  type HushcutError,
  type Logger,
  type SilenceDetector,
  type SilenceEditPlan,
  type SilenceReport,
} from '@hushcut/core';
import {
  createSilenceDetector,
  ensureFfmpeg,
  probeDuration,
  probeMeanVolume,
  probeVideoStream,
  renderPlan,
  resolveAutoThreshold,
  type ProbeOptions,
  type RenderPlanOptions,
  type RenderProgress,
  type RenderResult,
  type RenderStrategy,
  type VideoStreamInfo,
} from '@hushcut/providers';
import { loadConfigFile, resolveConfigPath, type HushcutConfigFile } from '../lib/config-file.js';
import { defaultOutputPath } from '../lib/output-path.js';
import type { RunConfiguration } from '../lib/summary.js';

export interface RemoveOptions {
  inputPath: string;
  outputPath?: string;
  threshold?: number;
  minDuration?: number;
  padding?: number;
  auto?: boolean;
  accelerate?: number;
  fluid?: boolean;
  dryRun?: boolean;
  /** Where to write the render plan as JSON */
  planPath?: string;
  strategy?: string;
  configPath?: string;
  logger: Logger;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  /** Called once the configuration is final, before detection runs */
  onConfigured?: (run: RunConfiguration) => void;
  onProgress?: (progress: RenderProgress) => void;
}

/**
 * External effects of a run. Tests replace these with in-process fakes.
 */
export interface RemoveDependencies {
  ensureFfmpeg: (ffmpegPath: string) => Promise<void>;
  createDetector: (selection: DetectorSelection) => SilenceDetector;
  probeDuration: (filePath: string, options?: ProbeOptions) => Promise<number>;
  probeMeanVolume: (filePath: string, options?: ProbeOptions) => Promise<number>;
  probeVideoStream: (filePath: string, options?: ProbeOptions) => Promise<VideoStreamInfo | undefined>;
  renderPlan: (
    plan: SilenceEditPlan['plan'],
    inputPath: string,
    outputPath: string,
    options?: RenderPlanOptions,
  ) => Promise<RenderResult>;
  fileExists: (filePath: string) => Promise<boolean>;
  fileSize: (filePath: string) => Promise<number>;
  writeTextFile: (filePath: string, contents: string) => Promise<void>;
}

export type RemoveStatus = 'rendered' | 'dry-run' | 'empty';

export interface RemoveResult {
  status: RemoveStatus;
  inputPath: string;
  outputPath: string;
  config: EngineConfig;
  edit: SilenceEditPlan;
  render?: RenderResult;
  outputSize?: number;
  planPath?: string;
  warnings: HushcutError[];
}

export const defaultRemoveDependencies: RemoveDependencies = {
  ensureFfmpeg: (ffmpegPath) => ensureFfmpeg(ffmpegPath),
  createDetector: (selection) => createSilenceDetector(selection),
  probeDuration,
  probeMeanVolume,
  probeVideoStream,
  renderPlan,
  fileExists: async (filePath) => {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  },
  fileSize: async (filePath) => (await stat(filePath)).size,
  writeTextFile: (filePath, contents) => writeFile(filePath, contents, 'utf8'),
};

const RENDER_STRATEGIES: readonly RenderStrategy[] = ['reencode', 'copy'];

function isRenderStrategy(value: string): value is RenderStrategy {
  return RENDER_STRATEGIES.some((strategy) => strategy === value);
}

export function resolveStrategy(flag: string | undefined, file: HushcutConfigFile): RenderStrategy {
  const value = flag ?? file.strategy ?? 'reencode';
  if (!isRenderStrategy(value)) {
    throw createValidationError(ValidationErrorCode.INVALID_FLAG_VALUE, `Unknown render strategy "${value}".`, {
      suggestion: `Use one of: ${RENDER_STRATEGIES.join(', ')}.`,
    });
  }
  return value;
}

/**
 * Detect silence in a media file, plan the edit and render it.
 */
export async function runRemove(
  options: RemoveOptions,
  deps: RemoveDependencies = defaultRemoveDependencies,
): Promise<RemoveResult> {
  const { logger, signal, env = process.env } = options;
  const inputPath = resolve(options.inputPath);
  const outputPath = resolve(options.outputPath ?? defaultOutputPath(inputPath));

  if (!(await deps.fileExists(inputPath))) {
    throw createValidationError(ValidationErrorCode.MISSING_INPUT_FILE, `Input file '${inputPath}' does not exist.`);
  }
  if (outputPath === inputPath) {
    throw createValidationError(ValidationErrorCode.INVALID_FLAG_VALUE, 'Output file must differ from the input file.', {
      context: outputPath,
    });
  }

  const configPath = resolveConfigPath(options.configPath, env);
  const file = configPath ? await loadConfigFile(configPath) : {};
  if (configPath) {
    logger.debug('remove.config.loaded', { configPath, keys: Object.keys(file) });
  }

  const strategy = resolveStrategy(options.strategy, file);
  const tools = resolveToolPaths(env);
  const ffmpegPath = file.ffmpegPath ?? tools.ffmpegPath;
  const ffprobePath = file.ffprobePath ?? tools.ffprobePath;

  // Validate flag values before any external tool runs.
  const engineInput = {
    threshold: options.threshold ?? file.threshold,
    minSilenceDuration: options.minDuration ?? file.minDuration,
    padding: options.padding ?? file.padding,
    accelerationFactor: options.accelerate ?? file.accelerate,
    fluidTransitions: options.fluid ?? file.fluid,
  };
  let config = createEngineConfig(engineInput);

  await deps.ensureFfmpeg(ffmpegPath);

  let meanVolume: number | undefined;
  if (options.auto ?? file.auto ?? false) {
    meanVolume = await deps.probeMeanVolume(inputPath, { ffmpegPath, signal, logger });
    config = createEngineConfig({ ...engineInput, threshold: resolveAutoThreshold(meanVolume) });
    logger.info('remove.threshold.auto', { meanVolume, threshold: config.threshold });
  }

  options.onConfigured?.({ inputPath, outputPath, config, meanVolume, strategy, dryRun: Boolean(options.dryRun) });

  const detector = deps.createDetector({ kind: 'ffmpeg', ffmpegPath });
  const silences = await detector.detect(inputPath, config, { signal, logger });
  const totalDuration = await deps.probeDuration(inputPath, { ffprobePath, signal });
  const edit = planSilenceEdit({ silences, totalDuration, config });

  const warnings: HushcutError[] = [];
  const warn = (warning: HushcutError): void => {
    warnings.push(warning);
    logger.warn(formatError(warning));
  };

  if (silences.length === 0) {
    warn(
      createHushcutError(WarningCode.NO_SILENCE_DETECTED, 'No silence was detected.', {
        suggestion: 'Raise the threshold (e.g. -30) or lower the minimum duration.',
      }),
    );
  }

  let planPath: string | undefined;
  if (options.planPath) {
    planPath = resolve(options.planPath);
    await deps.writeTextFile(planPath, `${serializePlan(inputPath, config, silences, edit)}\n`);
    logger.info('remove.plan.written', { planPath });
  }

  const base = { inputPath, outputPath, config, edit, planPath, warnings };

  if (edit.plan.mode === 'empty') {
    warn(
      createHushcutError(WarningCode.EMPTY_TIMELINE, 'No speech remains after silence detection; nothing to render.', {
        suggestion: 'Lower the threshold (e.g. -50) so quiet speech is not treated as silence.',
      }),
    );
    return { ...base, status: 'empty' };
  }

  if (options.dryRun) {
    return { ...base, status: 'dry-run' };
  }

  const video = await deps.probeVideoStream(inputPath, { ffprobePath, signal, logger });
  const render = await deps.renderPlan(edit.plan, inputPath, outputPath, {
    ffmpegPath,
    ffprobePath,
    strategy,
    hasVideo: video !== undefined,
    frameRate: video?.frameRate,
    preset: file.preset,
    crf: file.crf,
    audioBitrate: file.audioBitrate,
    durationTolerance: file.durationTolerance,
    signal,
    logger,
    onProgress: options.onProgress,
  });
  render.warnings.forEach(warn);

  const outputSize = await deps.fileSize(outputPath);
  return { ...base, status: 'rendered', render, outputSize };
}

/**
 * JSON document written by `--plan`.
 */
export function serializePlan(
  inputPath: string,
  config: EngineConfig,
  silences: SilenceReport,
  edit: SilenceEditPlan,
): string {
  return JSON.stringify(
    {
      input: inputPath,
      config,
      silences: silences.map((interval) => interval.toJSON()),
      speech: edit.speech.map((interval) => interval.toJSON()),
      plan: edit.plan,
      stats: edit.stats,
    },
    null,
    2,
  );
}
