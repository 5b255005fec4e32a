import { dirname, extname, basename, join } from 'node:path';

export const DEFAULT_OUTPUT_SUFFIX = '_no_silence';

/**
 * `<dir>/<stem>_no_silence<ext>` beside the input.
 */
export function defaultOutputPath(inputPath: string): string {
  const extension = extname(inputPath);
  const stem = basename(inputPath, extension);
  return join(dirname(inputPath), `${stem}${DEFAULT_OUTPUT_SUFFIX}${extension}`);
}
