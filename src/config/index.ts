import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigInvalidError, ConfigMissingError, ConfigParseError } from '../errors/index.js';

import { ConfigSchema, type Config } from './schema.js';

export { ConfigSchema } from './schema.js';
export type { Config } from './schema.js';

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'polystore.json');

/** Configuration used when no file is given: info-level logs, default backend options. */
export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Read and validate the CLI configuration file.
 * Throws CONFIG_MISSING, CONFIG_PARSE_ERROR or CONFIG_INVALID.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigParseError(error instanceof Error ? error.message : String(error));
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(issues);
  }

  return result.data;
}
