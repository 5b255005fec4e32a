#!/usr/bin/env node
/* eslint-env node */
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import { formatError, formatTime, isHushcutError, loadEnv, type LogLevel } from '@hushcut/core';
import { runRemove, type RemoveResult } from './commands/remove.js';
import { createCliLogger, resolveLogLevel } from './lib/logger.js';
import { formatConfigurationTable, formatSummaryLines } from './lib/summary.js';

loadEnv(import.meta.url);

const cli = meow(
  `\nUsage\n  $ hushcut remove <input> [options]\n\nCommands\n  remove              Cut (or speed up) the silent parts of a video or audio file\n\nOptions\n  --output, -o        Output file (default: <input>_no_silence.<ext>)\n  --threshold, -t     Silence threshold in dB (default: -40)\n  --min-duration, -d  Minimum silence length in seconds (default: 0.5)\n  --padding, -p       Seconds of silence kept around speech (default: 0.1)\n  --auto, -a          Derive the threshold from the mean volume\n  --accelerate, -x    Play silence at this speed instead of cutting it\n  --fluid             Ramp speed changes and blend accelerated frames\n  --dry-run           Detect and plan without rendering\n  --plan              Write the render plan as JSON to this file\n  --strategy          reencode (default) or copy\n  --config            YAML config file (default: $HUSHCUT_CONFIG)\n  --verbose, -v       Debug logging\n  --log-level         debug, info, warn or error (default: warn)\n\nExamples\n  $ hushcut remove lecture.mp4\n  $ hushcut remove lecture.mp4 -t -35 -d 0.8 -o lecture-tight.mp4\n  $ hushcut remove podcast.m4a --auto --dry-run --plan plan.json\n  $ hushcut remove tutorial.mp4 --accelerate 4 --fluid\n`,
  {
    importMeta: import.meta,
    flags: {
      output: { type: 'string', shortFlag: 'o' },
      threshold: { type: 'number', shortFlag: 't' },
      minDuration: { type: 'number', shortFlag: 'd' },
      padding: { type: 'number', shortFlag: 'p' },
      auto: { type: 'boolean', shortFlag: 'a' },
      accelerate: { type: 'number', shortFlag: 'x' },
      fluid: { type: 'boolean' },
      dryRun: { type: 'boolean' },
      plan: { type: 'string' },
      strategy: { type: 'string' },
      config: { type: 'string' },
      verbose: { type: 'boolean', shortFlag: 'v' },
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, ...rest] = cli.input;
  const { flags } = cli;

  switch (command) {
    case 'remove': {
      const [inputPath, ...extra] = rest;
      if (!inputPath) {
        console.error('Error: remove requires an input file.');
        console.error('Example: hushcut remove lecture.mp4');
        process.exitCode = 1;
        return;
      }
      if (extra.length > 0) {
        console.error(`Error: unexpected arguments: ${extra.join(' ')}`);
        process.exitCode = 1;
        return;
      }

      let logLevel: LogLevel;
      try {
        logLevel = resolveLogLevel(flags.logLevel, Boolean(flags.verbose));
      } catch (error) {
        printError(error);
        process.exitCode = 1;
        return;
      }

      const abort = new AbortController();
      const onInterrupt = (): void => abort.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const result = await runRemove({
          inputPath,
          outputPath: flags.output,
          threshold: flags.threshold,
          minDuration: flags.minDuration,
          padding: flags.padding,
          // meow reports unset booleans as false; only an explicit flag overrides the config file.
          auto: flags.auto || undefined,
          accelerate: flags.accelerate,
          fluid: flags.fluid || undefined,
          dryRun: Boolean(flags.dryRun),
          planPath: flags.plan,
          strategy: flags.strategy,
          configPath: flags.config,
          logger: createCliLogger({ level: logLevel }),
          signal: abort.signal,
          onConfigured: (run) => {
            for (const line of formatConfigurationTable(run)) {
              console.log(line);
            }
            console.log('');
          },
          onProgress: (progress) => {
            if (process.stderr.isTTY) {
              process.stderr.write(`\r${chalk.dim(`Rendering ${progress.percent}%`)}`);
            }
          },
        });
        if (process.stderr.isTTY && result.status === 'rendered') {
          process.stderr.write('\n');
        }
        printRemoveSummary(result);
      } catch (error) {
        printError(error);
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onInterrupt);
      }
      return;
    }
    case undefined: {
      cli.showHelp(0);
      return;
    }
    default: {
      console.error(`Unknown command: ${command}`);
      cli.showHelp(1);
    }
  }
}

function printRemoveSummary(result: RemoveResult): void {
  const bullet = chalk.dim('•');

  switch (result.status) {
    case 'empty':
      console.log(chalk.yellow('Nothing rendered: the whole input is silent at this threshold.'));
      break;
    case 'dry-run':
      console.log(chalk.bold(`Dry run: ${result.edit.stats.segmentCount} segments planned, no output written.`));
      break;
    case 'rendered':
      console.log(chalk.green(chalk.bold(`Saved ${result.outputPath}`)));
      break;
  }

  for (const line of formatSummaryLines(result.edit.stats, result.outputSize)) {
    console.log(`${bullet} ${line}`);
  }
  if (result.render?.actualDuration !== undefined) {
    console.log(`${bullet} Rendered duration: ${formatTime(result.render.actualDuration)}`);
  }
  if (result.planPath) {
    console.log(`${bullet} Plan: ${result.planPath}`);
  }
}

function printError(error: unknown): void {
  if (isHushcutError(error)) {
    console.error(chalk.red(formatError(error)));
    return;
  }
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
}

void main();
