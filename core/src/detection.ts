import type { EngineConfig } from './config.js';
import type { Logger } from './logger.js';
import type { SilenceReport } from './timeline/interval.js';

/**
 * Implementations a run can select. Each variant carries its own settings.
 */
export type DetectorSelection = { kind: 'ffmpeg'; ffmpegPath?: string };

export type DetectorKind = DetectorSelection['kind'];

export interface DetectOptions {
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

/**
 * Scans a media file's audio and reports its silent intervals.
 *
 * Implementations parse whatever their backend prints into a typed
 * {@link SilenceReport}; the engine never sees raw tool output.
 */
export interface SilenceDetector {
  readonly kind: DetectorKind;
  detect(inputPath: string, config: EngineConfig, options?: DetectOptions): Promise<SilenceReport>;
}
