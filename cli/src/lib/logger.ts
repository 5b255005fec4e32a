import chalk from 'chalk';
import {
  createValidationError,
  isLevelEnabled,
  ValidationErrorCode,
  type LogLevel,
  type LogMeta,
  type Logger,
} from '@hushcut/core';

export interface CliLoggerOptions {
  level?: LogLevel;
  /** Receives each formatted line; defaults to the console */
  write?: (line: string, level: LogLevel) => void;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

function writeToConsole(line: string, level: LogLevel): void {
  if (level === 'warn' || level === 'error') {
    console.error(line);
    return;
  }
  console.log(line);
}

export function formatLogLine(level: LogLevel, message: string, meta?: LogMeta): string {
  const label = LEVEL_STYLES[level](`[${level}]`);
  const details = meta && Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : '';
  return `${label} ${message}${details}`;
}

export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const write = options.write ?? writeToConsole;

  const emit = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (isLevelEnabled(level, threshold)) {
      write(formatLogLine(level, message, meta), level);
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * `--verbose` wins over `--log-level`; neither means warnings only.
 */
export function resolveLogLevel(levelFlag: string | undefined, verbose = false): LogLevel {
  if (verbose) {
    return 'debug';
  }
  if (levelFlag === undefined) {
    return 'warn';
  }
  if (isLogLevel(levelFlag)) {
    return levelFlag;
  }
  throw createValidationError(ValidationErrorCode.INVALID_FLAG_VALUE, `Invalid log level "${levelFlag}".`, {
    suggestion: `Use one of: ${LOG_LEVELS.join(', ')}.`,
  });
}
