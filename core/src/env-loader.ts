import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync, readFileSync } from 'node:fs';

export interface EnvLoaderOptions {
  verbose?: boolean;
  /** Directory used instead of `process.cwd()` for the fallback lookup */
  cwd?: string;
}

export interface EnvLoaderResult {
  loaded: string[];
}

function declaresWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    return false;
  }
}

export function findWorkspaceRoot(startDir: string): string | null {
  let current = startDir;
  const root = resolve('/');
  while (current !== root) {
    const packageJsonPath = resolve(current, 'package.json');
    if (existsSync(packageJsonPath) && declaresWorkspaces(packageJsonPath)) {
      return current;
    }
    current = dirname(current);
  }
  return null;
}

/**
 * Load environment variables from .env files.
 *
 * Searches for .env files in the following order (first file found takes priority):
 * 1. Workspace root (the package.json declaring `workspaces`)
 * 2. Current working directory (as fallback)
 *
 * @param callerUrl - The import.meta.url of the calling module
 */
export function loadEnv(callerUrl: string, options: EnvLoaderOptions = {}): EnvLoaderResult {
  const callerDir = dirname(fileURLToPath(callerUrl));
  const workspaceRoot = findWorkspaceRoot(callerDir);
  const loaded: string[] = [];

  if (workspaceRoot) {
    const rootEnvPath = resolve(workspaceRoot, '.env');
    if (existsSync(rootEnvPath)) {
      const result = dotenvConfig({ path: rootEnvPath });
      if (result.parsed) {
        loaded.push(rootEnvPath);
        if (options.verbose) {
          console.log(`[env] Loaded: ${rootEnvPath}`);
        }
      }
    }
  }

  // Fallback from cwd never overrides values already set.
  const cwdEnvPath = resolve(options.cwd ?? process.cwd(), '.env');
  if (!loaded.includes(cwdEnvPath) && existsSync(cwdEnvPath)) {
    const result = dotenvConfig({ path: cwdEnvPath, override: false });
    if (result.parsed) {
      loaded.push(cwdEnvPath);
      if (options.verbose) {
        console.log(`[env] Loaded (fallback): ${cwdEnvPath}`);
      }
    }
  }

  return { loaded };
}

export interface ToolPaths {
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Resolves the ffmpeg and ffprobe binaries, honouring
 * `HUSHCUT_FFMPEG_PATH` and `HUSHCUT_FFPROBE_PATH`.
 */
export function resolveToolPaths(env: NodeJS.ProcessEnv = process.env): ToolPaths {
  return {
    ffmpegPath: env.HUSHCUT_FFMPEG_PATH || 'ffmpeg',
    ffprobePath: env.HUSHCUT_FFPROBE_PATH || 'ffprobe',
  };
}
