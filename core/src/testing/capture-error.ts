/**
 * Test utility: runs `fn` and returns what it threw.
 * Fails the test when nothing is thrown.
 */
import { isHushcutError, type HushcutError } from '../errors/index.js';

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export function captureHushcutError(fn: () => unknown): HushcutError {
  const error = captureError(fn);
  if (!isHushcutError(error)) {
    throw new Error(`Expected a HushcutError, got: ${String(error)}`);
  }
  return error;
}

export async function captureHushcutErrorAsync(fn: () => Promise<unknown>): Promise<HushcutError> {
  try {
    await fn();
  } catch (error) {
    if (!isHushcutError(error)) {
      throw new Error(`Expected a HushcutError, got: ${String(error)}`);
    }
    return error;
  }
  throw new Error('Expected promise to reject');
}
