/**
 * How a cut plan is turned into an output file.
 * - reencode: trim/concat filter graph, frame-accurate, slower
 * - copy: concat demuxer with stream copy, lossless, cuts snap to keyframes
 */
export type RenderStrategy = 'reencode' | 'copy';

/**
 * Options for building an FFmpeg render command.
 */
export interface RenderOptions {
  /** FFmpeg binary path */
  ffmpegPath: string;
  /** x264 encoding preset */
  preset: string;
  /** Constant Rate Factor for quality */
  crf: number;
  /** Audio bitrate */
  audioBitrate: string;
  strategy: RenderStrategy;
  /** Output frame rate for accelerated video */
  frameRate: number;
  /** Where the concat list is written for the copy strategy */
  concatListPath?: string;
}

/**
 * File the renderer writes before running the command.
 */
export interface ConcatListFile {
  path: string;
  contents: string;
}

/**
 * Represents a complete FFmpeg command ready for execution.
 */
export interface FfmpegCommand {
  /** FFmpeg binary path */
  ffmpegPath: string;
  /** Command-line arguments */
  args: string[];
  inputPath: string;
  outputPath: string;
  /** Output duration the plan promises, in seconds */
  expectedDuration: number;
  concatList?: ConcatListFile;
}

/**
 * Default configuration values.
 */
export const RENDER_DEFAULTS = {
  ffmpegPath: 'ffmpeg',
  preset: 'ultrafast',
  crf: 20,
  audioBitrate: '192k',
  strategy: 'reencode',
  frameRate: 30,
} as const satisfies Omit<RenderOptions, 'concatListPath'>;

export interface FfmpegProgressSnapshot {
  timeSeconds: number;
  fps: number | null;
  speed: number | null;
}

export interface RenderProgress {
  percent: number;
  renderedSeconds: number;
  totalSeconds: number;
  snapshot: FfmpegProgressSnapshot;
}
