import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, StorageConfig } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

/**
 * Resolve the config file path: explicit argument, then BLOCKSTORE_CONFIG,
 * then ./config/config.json.
 */
export function resolveConfigPath(configPath?: string): string {
  if (configPath) return configPath;
  const fromEnv = process.env.BLOCKSTORE_CONFIG;
  return fromEnv ? resolve(fromEnv) : DEFAULT_CONFIG_PATH;
}

export function loadConfig(configPath?: string): Config {
  const path = resolveConfigPath(configPath);

  // Check file exists
  if (!existsSync(path)) {
    throw new ConfigMissingError(path);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(path, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  // Validate with Zod
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
