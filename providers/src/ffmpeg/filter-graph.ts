import type { CutPlan, CutRange, SpeedPlan, SpeedPlanEntry } from '@hushcut/core';

/** atempo accepts factors in [0.5, 2.0] per instance. */
export const MAX_ATEMPO_FACTOR = 2;

/** Upper bound on frames averaged by tmix for one output frame. */
export const MAX_BLEND_FRAMES = 8;

export interface FilterGraphOptions {
  /** False for audio-only input; no video chains are built */
  hasVideo: boolean;
  /** Output frame rate after accelerated video is resampled */
  frameRate: number;
}

export interface FilterGraph {
  filterComplex: string;
  /** Output pad of the concatenated video, absent for audio-only input */
  videoLabel?: string;
  audioLabel: string;
}

/**
 * Seconds as ffmpeg option text: at most six decimals, no trailing zeros.
 */
export function formatSeconds(value: number): string {
  return String(Number(value.toFixed(6)));
}

/**
 * Splits a tempo factor into atempo stages that each stay within range.
 *
 * @example
 * buildAtempoChain(3) // [2, 1.5]
 * buildAtempoChain(4) // [2, 2]
 */
export function buildAtempoChain(speedFactor: number): number[] {
  const stages: number[] = [];
  let remaining = speedFactor;
  while (remaining > MAX_ATEMPO_FACTOR) {
    stages.push(MAX_ATEMPO_FACTOR);
    remaining /= MAX_ATEMPO_FACTOR;
  }
  if (remaining !== 1 || stages.length === 0) {
    stages.push(remaining);
  }
  return stages;
}

/**
 * Frames tmix averages into each output frame of a sped-up segment.
 */
export function blendFrameCount(speedFactor: number): number {
  return Math.min(Math.ceil(speedFactor), MAX_BLEND_FRAMES);
}

/**
 * Removal mode: trim every kept range and concatenate the pieces.
 */
export function buildCutFilterGraph(plan: CutPlan, options: FilterGraphOptions): FilterGraph {
  const pieces = plan.ranges.map((range, index) => ({
    video: options.hasVideo ? `[0:v]${trimVideo(range)},setpts=PTS-STARTPTS[v${index}]` : undefined,
    audio: `[0:a]${trimAudio(range)},asetpts=PTS-STARTPTS[a${index}]`,
  }));
  return concatPieces(pieces, options.hasVideo);
}

/**
 * Acceleration mode: retime every segment by its speed factor and
 * concatenate. Blend-eligible segments average frames before retiming.
 * Retimed pieces are cut to the entry's planned output span so video and
 * audio stay aligned with the plan's output timing.
 */
export function buildSpeedFilterGraph(plan: SpeedPlan, options: FilterGraphOptions): FilterGraph {
  const pieces = plan.entries.map((entry, index) => ({
    video: options.hasVideo ? `[0:v]${buildVideoSpeedChain(entry, options.frameRate)}[v${index}]` : undefined,
    audio: `[0:a]${buildAudioSpeedChain(entry)}[a${index}]`,
  }));
  return concatPieces(pieces, options.hasVideo);
}

export function buildVideoSpeedChain(entry: SpeedPlanEntry, frameRate: number): string {
  const filters = [trimVideo({ start: entry.sourceStart, end: entry.sourceEnd })];

  if (entry.speedFactor === 1) {
    filters.push('setpts=PTS-STARTPTS');
    return filters.join(',');
  }

  if (entry.blendEligible) {
    filters.push(`tmix=frames=${blendFrameCount(entry.speedFactor)}`);
  }
  filters.push(`setpts=(PTS-STARTPTS)/${formatSeconds(entry.speedFactor)}`);
  filters.push(`fps=${formatSeconds(frameRate)}`);
  filters.push(`trim=duration=${formatSeconds(outputSpan(entry))}`);
  return filters.join(',');
}

export function buildAudioSpeedChain(entry: SpeedPlanEntry): string {
  const filters = [trimAudio({ start: entry.sourceStart, end: entry.sourceEnd }), 'asetpts=PTS-STARTPTS'];

  if (entry.speedFactor !== 1) {
    for (const stage of buildAtempoChain(entry.speedFactor)) {
      filters.push(`atempo=${formatSeconds(stage)}`);
    }
    // atempo can end a few samples short; pad then cut to the planned span.
    filters.push('apad', `atrim=duration=${formatSeconds(outputSpan(entry))}`);
  }
  return filters.join(',');
}

function outputSpan(entry: SpeedPlanEntry): number {
  return entry.outputEnd - entry.outputStart;
}

function trimVideo(range: CutRange): string {
  return `trim=start=${formatSeconds(range.start)}:end=${formatSeconds(range.end)}`;
}

function trimAudio(range: CutRange): string {
  return `atrim=start=${formatSeconds(range.start)}:end=${formatSeconds(range.end)}`;
}

function concatPieces(pieces: { video?: string; audio: string }[], hasVideo: boolean): FilterGraph {
  const filterParts: string[] = [];
  let concatInputs = '';

  pieces.forEach((piece, index) => {
    if (piece.video) {
      filterParts.push(piece.video);
    }
    filterParts.push(piece.audio);
    concatInputs += hasVideo ? `[v${index}][a${index}]` : `[a${index}]`;
  });

  if (hasVideo) {
    filterParts.push(`${concatInputs}concat=n=${pieces.length}:v=1:a=1[outv][outa]`);
    return { filterComplex: filterParts.join(';'), videoLabel: 'outv', audioLabel: 'outa' };
  }

  filterParts.push(`${concatInputs}concat=n=${pieces.length}:v=0:a=1[outa]`);
  return { filterComplex: filterParts.join(';'), audioLabel: 'outa' };
}
