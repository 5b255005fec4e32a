import {
  Interval,
  TIME_EPSILON,
  ToolErrorCode,
  type DetectOptions,
  type EngineConfig,
  type SilenceDetector,
  type SilenceReport,
} from '@hushcut/core';
import { execFileRunner, toToolError, type ProcessRunner } from './process-runner.js';

// ffmpeg prints timestamps with %g, so tiny values come out as 5e-05.
const SILENCE_START_PATTERN = /silence_start:\s*(-?\d+(?:\.\d+)?(?:e[-+]?\d+)?)/i;
const SILENCE_END_PATTERN = /silence_end:\s*(-?\d+(?:\.\d+)?(?:e[-+]?\d+)?)/i;
const DURATION_HEADER_PATTERN = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;

/**
 * Arguments for a silencedetect pass that decodes audio into the null muxer.
 */
export function buildSilenceDetectArgs(inputPath: string, config: EngineConfig): string[] {
  return [
    '-hide_banner',
    '-nostats',
    '-i',
    inputPath,
    '-af',
    `silencedetect=noise=${config.threshold}dB:d=${config.minSilenceDuration}`,
    '-f',
    'null',
    '-',
  ];
}

/**
 * Input duration from ffmpeg's `Duration: HH:MM:SS.xx` header, if printed.
 */
export function parseDurationHeader(stderr: string): number | undefined {
  const match = stderr.match(DURATION_HEADER_PATTERN);
  if (!match) {
    return undefined;
  }
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

/**
 * Extracts silent intervals from silencedetect stderr.
 *
 * Starts are clamped at zero (ffmpeg can report a slightly negative start
 * for silence at the head of the file). A start left open at the end of the
 * output is closed at the header duration, or dropped when there is none.
 */
export function parseSilenceDetectOutput(stderr: string): Interval[] {
  const intervals: Interval[] = [];
  let openStart: number | undefined;

  const pushInterval = (start: number, end: number): void => {
    if (end - start > TIME_EPSILON) {
      intervals.push(Interval.of(start, end));
    }
  };

  for (const line of stderr.split(/\r?\n|\r/g)) {
    if (!line.includes('silencedetect')) {
      continue;
    }

    const startMatch = line.match(SILENCE_START_PATTERN);
    if (startMatch) {
      openStart = Math.max(0, Number(startMatch[1]));
      continue;
    }

    const endMatch = line.match(SILENCE_END_PATTERN);
    if (endMatch && openStart !== undefined) {
      pushInterval(openStart, Math.max(0, Number(endMatch[1])));
      openStart = undefined;
    }
  }

  if (openStart !== undefined) {
    const duration = parseDurationHeader(stderr);
    if (duration !== undefined) {
      pushInterval(openStart, duration);
    }
  }

  return intervals;
}

export interface FfmpegSilenceDetectorOptions {
  ffmpegPath?: string;
  runner?: ProcessRunner;
}

export class FfmpegSilenceDetector implements SilenceDetector {
  readonly kind = 'ffmpeg';
  private readonly ffmpegPath: string;
  private readonly runner: ProcessRunner;

  constructor(options: FfmpegSilenceDetectorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? execFileRunner;
  }

  async detect(inputPath: string, config: EngineConfig, options: DetectOptions = {}): Promise<SilenceReport> {
    const { logger = {}, signal } = options;
    const args = buildSilenceDetectArgs(inputPath, config);

    logger.info?.('detector.silence.start', {
      inputPath,
      threshold: config.threshold,
      minSilenceDuration: config.minSilenceDuration,
    });

    let stderr: string;
    try {
      ({ stderr } = await this.runner(this.ffmpegPath, args, { signal }));
    } catch (error) {
      throw toToolError(error, {
        binary: this.ffmpegPath,
        code: ToolErrorCode.DETECTION_FAILED,
        action: 'Silence detection',
        inputPath,
      });
    }

    const report = parseSilenceDetectOutput(stderr);
    logger.info?.('detector.silence.end', { inputPath, silenceCount: report.length });
    logger.debug?.('detector.silence.intervals', {
      intervals: report.map((interval) => interval.toJSON()),
    });
    return report;
  }
}
