import chalk from 'chalk';
import { formatTime, type EngineConfig, type SilenceEditStats } from '@hushcut/core';
import type { RenderStrategy } from '@hushcut/providers';

export interface RunConfiguration {
  inputPath: string;
  outputPath: string;
  config: EngineConfig;
  /** Mean volume the threshold was derived from, when --auto was used */
  meanVolume?: number;
  strategy: RenderStrategy;
  dryRun: boolean;
}

export function describeMode(config: EngineConfig): string {
  if (config.accelerationFactor === undefined) {
    return 'remove silence';
  }
  const fluid = config.fluidTransitions ? ', fluid transitions' : '';
  return `accelerate silence ${config.accelerationFactor}x${fluid}`;
}

/**
 * Label/value rows shown before processing starts.
 */
export function buildConfigurationRows(run: RunConfiguration): Array<[string, string]> {
  const threshold =
    run.meanVolume !== undefined
      ? `${run.config.threshold} dB (auto, mean volume ${run.meanVolume} dB)`
      : `${run.config.threshold} dB`;

  return [
    ['Input File', run.inputPath],
    ['Output File', run.dryRun ? `${run.outputPath} (dry run)` : run.outputPath],
    ['Threshold', threshold],
    ['Min Duration', `${run.config.minSilenceDuration} s`],
    ['Padding', `${run.config.padding} s`],
    ['Mode', describeMode(run.config)],
    ['Strategy', run.strategy],
  ];
}

export function formatConfigurationTable(run: RunConfiguration): string[] {
  const rows = buildConfigurationRows(run);
  const width = Math.max(...rows.map(([label]) => label.length));
  return [
    chalk.bold('Configuration'),
    ...rows.map(([label, value]) => `  ${chalk.cyan(label.padEnd(width))}  ${value}`),
  ];
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatSummaryLines(stats: SilenceEditStats, outputSize?: number): string[] {
  const segmentLabel = stats.segmentCount === 1 ? 'segment' : 'segments';
  const lines = [
    `Silences detected: ${stats.silenceCount}`,
    `Removed: ${formatTime(stats.removedDuration)}`,
    `Final duration: ${formatTime(stats.outputDuration)} (${stats.segmentCount} ${segmentLabel})`,
  ];
  if (outputSize !== undefined) {
    lines.push(`Output size: ${formatBytes(outputSize)}`);
  }
  return lines;
}
