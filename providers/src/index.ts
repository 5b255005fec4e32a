export type {
  RenderStrategy,
  RenderOptions,
  FfmpegCommand,
  ConcatListFile,
  FfmpegProgressSnapshot,
  RenderProgress,
} from './ffmpeg/types.js';
export { RENDER_DEFAULTS } from './ffmpeg/types.js';
export { execFileRunner, ensureFfmpeg, toToolError, ProcessFailure } from './ffmpeg/process-runner.js';
export type { ProcessRunner, ProcessResult, RunProcessOptions, ToolFailureContext } from './ffmpeg/process-runner.js';
export {
  FfmpegSilenceDetector,
  buildSilenceDetectArgs,
  parseSilenceDetectOutput,
  parseDurationHeader,
} from './ffmpeg/silence-detector.js';
export type { FfmpegSilenceDetectorOptions } from './ffmpeg/silence-detector.js';
export {
  probeDuration,
  probeMeanVolume,
  probeVideoStream,
  parseFrameRate,
  parseProbeEntries,
  resolveAutoThreshold,
  FALLBACK_MEAN_VOLUME_DB,
} from './ffmpeg/probe.js';
export type { ProbeOptions, VideoStreamInfo } from './ffmpeg/probe.js';
export {
  buildCutFilterGraph,
  buildSpeedFilterGraph,
  buildAtempoChain,
  formatSeconds,
} from './ffmpeg/filter-graph.js';
export type { FilterGraph, FilterGraphOptions } from './ffmpeg/filter-graph.js';
export { buildConcatList } from './ffmpeg/concat-list.js';
export { buildRenderCommand } from './ffmpeg/command-builder.js';
export type { BuildRenderCommandOptions } from './ffmpeg/command-builder.js';
export { renderPlan, parseFfmpegProgressLine, DEFAULT_DURATION_TOLERANCE } from './ffmpeg/renderer.js';
export type { RenderPlanOptions, RenderResult } from './ffmpeg/renderer.js';
export { createSilenceDetector } from './ffmpeg/registry.js';
export type { DetectorDependencies } from './ffmpeg/registry.js';
