import { createToolError, ToolErrorCode, type Logger } from '@hushcut/core';
import { execFileRunner, ProcessFailure, toToolError, type ProcessRunner } from './process-runner.js';
import { RENDER_DEFAULTS } from './types.js';

/** Mean volume assumed when volumedetect prints nothing usable. */
export const FALLBACK_MEAN_VOLUME_DB = -20;

/** dB above the mean volume that still counts as silence in auto mode. */
export const AUTO_THRESHOLD_OFFSET_DB = 2;

const MEAN_VOLUME_PATTERN = /mean_volume:\s*(-?\d+(?:\.\d+)?)\s*dB/;

export interface ProbeOptions {
  ffprobePath?: string;
  ffmpegPath?: string;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

/**
 * Container duration in seconds, as reported by ffprobe.
 */
export async function probeDuration(filePath: string, options: ProbeOptions = {}): Promise<number> {
  const { ffprobePath = 'ffprobe', runner = execFileRunner, signal } = options;

  let stdout: string;
  try {
    ({ stdout } = await runner(
      ffprobePath,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { signal },
    ));
  } catch (error) {
    throw toToolError(error, {
      binary: ffprobePath,
      code: ToolErrorCode.PROBE_FAILED,
      action: `Probing duration of '${filePath}'`,
      inputPath: filePath,
    });
  }

  const duration = Number.parseFloat(stdout.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw createToolError(
      ToolErrorCode.PROBE_FAILED,
      `Failed to parse duration for '${filePath}'. ffprobe output: '${stdout.trim()}'`,
    );
  }
  return duration;
}

/**
 * Mean audio level in dB from a volumedetect pass.
 *
 * Falls back to {@link FALLBACK_MEAN_VOLUME_DB} when the pass fails or its
 * output has no mean_volume line. A missing ffmpeg binary still throws.
 */
export async function probeMeanVolume(filePath: string, options: ProbeOptions = {}): Promise<number> {
  const { ffmpegPath = 'ffmpeg', runner = execFileRunner, signal, logger = {} } = options;

  let stderr: string;
  try {
    ({ stderr } = await runner(
      ffmpegPath,
      ['-hide_banner', '-nostats', '-i', filePath, '-af', 'volumedetect', '-f', 'null', '-'],
      { signal },
    ));
  } catch (error) {
    if (error instanceof ProcessFailure && (error.errno === 'ENOENT' || error.aborted)) {
      throw toToolError(error, { binary: ffmpegPath, code: ToolErrorCode.PROBE_FAILED, action: 'Volume detection' });
    }
    logger.warn?.('probe.volume.failed', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
      fallback: FALLBACK_MEAN_VOLUME_DB,
    });
    return FALLBACK_MEAN_VOLUME_DB;
  }

  const match = stderr.match(MEAN_VOLUME_PATTERN);
  if (!match) {
    logger.warn?.('probe.volume.unparsed', { filePath, fallback: FALLBACK_MEAN_VOLUME_DB });
    return FALLBACK_MEAN_VOLUME_DB;
  }
  return Number(match[1]);
}

/**
 * Silence threshold a little above the noise floor, rounded to 0.1 dB.
 * Never returns a non-negative value.
 */
export function resolveAutoThreshold(meanVolume: number): number {
  const threshold = Math.round((meanVolume + AUTO_THRESHOLD_OFFSET_DB) * 10) / 10;
  return threshold >= 0 ? -1 : threshold;
}

export interface VideoStreamInfo {
  /** Frames per second used when accelerated segments are resampled */
  frameRate: number;
  frameRateSource: 'average' | 'nominal' | 'default';
}

/**
 * First video stream of the input, or undefined when there is none.
 *
 * Cover art (an attached picture) does not count as video. When ffprobe
 * reports no usable average rate (`0/0` on some VFR and Matroska streams),
 * the nominal `r_frame_rate` is used, then {@link RENDER_DEFAULTS.frameRate}.
 */
export async function probeVideoStream(
  filePath: string,
  options: ProbeOptions = {},
): Promise<VideoStreamInfo | undefined> {
  const { ffprobePath = 'ffprobe', runner = execFileRunner, signal, logger = {} } = options;

  let stdout: string;
  try {
    ({ stdout } = await runner(
      ffprobePath,
      [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-show_entries',
        'stream=codec_type,avg_frame_rate,r_frame_rate:stream_disposition=attached_pic',
        '-of',
        'default=noprint_wrappers=1',
        filePath,
      ],
      { signal },
    ));
  } catch (error) {
    throw toToolError(error, {
      binary: ffprobePath,
      code: ToolErrorCode.PROBE_FAILED,
      action: `Probing video stream of '${filePath}'`,
      inputPath: filePath,
    });
  }

  const entries = parseProbeEntries(stdout);
  if (entries.get('codec_type') !== 'video' || entries.get('DISPOSITION:attached_pic') === '1') {
    return undefined;
  }

  const average = parseFrameRate(entries.get('avg_frame_rate') ?? '');
  if (average !== undefined) {
    return { frameRate: average, frameRateSource: 'average' };
  }
  const nominal = parseFrameRate(entries.get('r_frame_rate') ?? '');
  const info: VideoStreamInfo =
    nominal !== undefined
      ? { frameRate: nominal, frameRateSource: 'nominal' }
      : { frameRate: RENDER_DEFAULTS.frameRate, frameRateSource: 'default' };
  logger.debug?.('probe.video.rate_fallback', { filePath, ...info });
  return info;
}

/**
 * `key=value` lines from ffprobe's default writer.
 */
export function parseProbeEntries(stdout: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of stdout.split(/\r?\n/)) {
    const separator = line.indexOf('=');
    if (separator > 0) {
      entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
  }
  return entries;
}

/**
 * Parses ffprobe's rational frame rate (`30000/1001`) or a plain number.
 */
export function parseFrameRate(raw: string): number | undefined {
  if (!raw) {
    return undefined;
  }
  const [numeratorRaw, denominatorRaw = '1'] = raw.split('/');
  const numerator = Number(numeratorRaw);
  const denominator = Number(denominatorRaw);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || numerator <= 0 || denominator <= 0) {
    return undefined;
  }
  return numerator / denominator;
}
