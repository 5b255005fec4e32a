import { execFile } from 'node:child_process';
import {
  createToolError,
  ToolErrorCode,
  type HushcutError,
  type ToolErrorCodeValue,
} from '@hushcut/core';

const MAX_STDIO_BUFFER_BYTES = 100 * 1024 * 1024;

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  signal?: AbortSignal;
  /** Receives stderr as it streams, before the process exits */
  onStderr?: (chunk: string) => void;
}

/**
 * Runs an external binary to completion. Injected everywhere a tool is
 * spawned so tests never start a real process.
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options?: RunProcessOptions,
) => Promise<ProcessResult>;

/**
 * Failure of a spawned process, with whatever it printed before dying.
 */
export class ProcessFailure extends Error {
  readonly errno?: string;
  readonly exitCode?: number;
  readonly signal?: string;
  readonly stderr: string;
  readonly aborted: boolean;

  constructor(
    message: string,
    details: { errno?: string; exitCode?: number; signal?: string; stderr: string; aborted: boolean; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = 'ProcessFailure';
    this.errno = details.errno;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.stderr = details.stderr;
    this.aborted = details.aborted;
  }
}

export const execFileRunner: ProcessRunner = (command, args, options = {}) => {
  const { signal, onStderr } = options;
  let streamedStderr = '';

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = execFile(
      command,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_STDIO_BUFFER_BYTES, signal },
      (error, stdout, stderr) => {
        if (error) {
          reject(
            new ProcessFailure(error.message, {
              errno: typeof error.code === 'string' ? error.code : undefined,
              exitCode: typeof error.code === 'number' ? error.code : undefined,
              signal: error.signal ?? undefined,
              stderr: stderr || streamedStderr,
              aborted: error.name === 'AbortError' || error.code === 'ABORT_ERR',
              cause: error,
            }),
          );
          return;
        }
        resolve({ stdout, stderr });
      },
    );

    child.stderr?.on('data', (chunk) => {
      const text = String(chunk);
      streamedStderr += text;
      onStderr?.(text);
    });
  });
};

export interface ToolFailureContext {
  /** Binary that was run, for the not-found message */
  binary: string;
  /** Code used when the failure has no more specific cause */
  code: ToolErrorCodeValue;
  /** What was being attempted, e.g. "Silence detection" */
  action: string;
  inputPath?: string;
}

/**
 * Maps a failed process to a coded tool error.
 */
export function toToolError(error: unknown, context: ToolFailureContext): HushcutError {
  if (!(error instanceof ProcessFailure)) {
    const message = error instanceof Error ? error.message : String(error);
    return createToolError(context.code, `${context.action} failed: ${message}`, { cause: error });
  }

  if (error.aborted) {
    return createToolError(ToolErrorCode.RENDER_CANCELLED, `${context.action} was cancelled.`, { cause: error });
  }

  if (error.errno === 'ENOENT') {
    return createToolError(
      ToolErrorCode.FFMPEG_NOT_FOUND,
      `'${context.binary}' was not found. Ensure FFmpeg is installed and in your PATH.`,
      { cause: error, suggestion: 'Install FFmpeg or set HUSHCUT_FFMPEG_PATH / HUSHCUT_FFPROBE_PATH.' },
    );
  }

  if (error.stderr.includes('No such file or directory')) {
    return createToolError(
      ToolErrorCode.INPUT_NOT_FOUND,
      `${context.action} failed: input file not found${context.inputPath ? ` (${context.inputPath})` : ''}.`,
      { cause: error },
    );
  }

  const exitInfo = error.signal
    ? `Process killed by signal: ${error.signal}`
    : error.exitCode !== undefined
      ? `Exit code: ${error.exitCode}`
      : 'Unknown exit reason';
  const details = error.stderr.trim()
    ? `${context.action} failed. ${exitInfo}\nstderr:\n${error.stderr.trim()}`
    : `${context.action} failed. ${exitInfo}\n${error.message}`;

  return createToolError(context.code, details, { cause: error });
}

/**
 * Checks that ffmpeg can be started.
 */
export async function ensureFfmpeg(ffmpegPath: string, runner: ProcessRunner = execFileRunner): Promise<void> {
  try {
    await runner(ffmpegPath, ['-version']);
  } catch (error) {
    throw toToolError(error, { binary: ffmpegPath, code: ToolErrorCode.FFMPEG_NOT_FOUND, action: 'FFmpeg check' });
  }
}
