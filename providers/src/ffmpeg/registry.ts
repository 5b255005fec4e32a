import type { DetectorSelection, SilenceDetector } from '@hushcut/core';
import type { ProcessRunner } from './process-runner.js';
import { FfmpegSilenceDetector } from './silence-detector.js';

export interface DetectorDependencies {
  runner?: ProcessRunner;
}

/**
 * Resolve a detector selection to its implementation.
 */
export function createSilenceDetector(
  selection: DetectorSelection,
  deps: DetectorDependencies = {},
): SilenceDetector {
  switch (selection.kind) {
    case 'ffmpeg':
      return new FfmpegSilenceDetector({ ffmpegPath: selection.ffmpegPath, runner: deps.runner });
  }
}
