/* eslint-env node */
import process from 'node:process';
import { readFile } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type ValidateFunction } from 'ajv';
import { parse as parseYaml } from 'yaml';
import { createValidationError, ValidationErrorCode } from '@hushcut/core';
import type { RenderStrategy } from '@hushcut/providers';

export interface HushcutConfigFile {
  threshold?: number;
  minDuration?: number;
  padding?: number;
  auto?: boolean;
  accelerate?: number;
  fluid?: boolean;
  strategy?: RenderStrategy;
  preset?: string;
  crf?: number;
  audioBitrate?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  durationTolerance?: number;
}

export const CONFIG_SCHEMA_PATH = fileURLToPath(new URL('../../schemas/config.schema.json', import.meta.url));

let validator: ValidateFunction<HushcutConfigFile> | undefined;

function getValidator(): ValidateFunction<HushcutConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<HushcutConfigFile>(JSON.parse(readFileSync(CONFIG_SCHEMA_PATH, 'utf8')));
  }
  return validator;
}

/**
 * Config file named by the flag, else by HUSHCUT_CONFIG, else none.
 */
export function resolveConfigPath(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const candidate = flag ?? env.HUSHCUT_CONFIG;
  return candidate ? resolve(candidate) : undefined;
}

/**
 * Parse and validate config file text. An empty document is an empty config.
 */
export function parseConfigFile(contents: string, label: string): HushcutConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw createValidationError(
      ValidationErrorCode.INVALID_CONFIG_FILE,
      `Config file is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      { context: label, cause: error },
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const validate = getValidator();
  if (!validate(parsed)) {
    const messages = (validate.errors ?? []).map((err) => {
      const where = err.instancePath || '/';
      const extra =
        err.keyword === 'additionalProperties' && 'additionalProperty' in err.params
          ? ` '${String(err.params.additionalProperty)}'`
          : '';
      return `${where} ${err.message ?? ''}${extra}`.trim();
    });
    throw createValidationError(ValidationErrorCode.INVALID_CONFIG_FILE, `Invalid config file: ${messages.join('; ')}`, {
      context: label,
    });
  }
  return parsed;
}

export async function loadConfigFile(configPath: string): Promise<HushcutConfigFile> {
  let contents: string;
  try {
    contents = await readFile(configPath, 'utf8');
  } catch (error) {
    throw createValidationError(ValidationErrorCode.INVALID_CONFIG_FILE, `Cannot read config file '${configPath}'.`, {
      context: configPath,
      cause: error,
    });
  }
  return parseConfigFile(contents, configPath);
}
