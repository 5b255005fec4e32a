import type { CutPlan } from '@hushcut/core';
import { formatSeconds } from './filter-graph.js';

/**
 * Quotes a path for an ffconcat `file` directive.
 */
export function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * Concat-demuxer script that plays each kept range of the input in order.
 * Used with stream copy, so cut points land on the nearest keyframes.
 */
export function buildConcatList(plan: CutPlan, inputPath: string): string {
  const lines = ['ffconcat version 1.0'];
  const file = quoteConcatPath(inputPath);

  for (const range of plan.ranges) {
    lines.push(`file ${file}`);
    lines.push(`inpoint ${formatSeconds(range.start)}`);
    lines.push(`outpoint ${formatSeconds(range.end)}`);
  }

  return `${lines.join('\n')}\n`;
}
