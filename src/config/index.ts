import { readFileSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import {
  ConfigMissingError,
  ConfigParseError,
  ConfigInvalidError,
  errorMessage,
} from '../errors/index.js';

export type { Config, StorageConfig } from './schema.js';
export { ConfigSchema, StorageConfigSchema } from './schema.js';

/** Config file used when no path is given: $HASH_TABLE_CONFIG, else ./config/config.json */
export function defaultConfigPath(): string {
  return resolve(process.env.HASH_TABLE_CONFIG ?? resolve(process.cwd(), 'config', 'config.json'));
}

/**
 * Load and validate a JSON config file.
 *
 * A relative `storage.rootDir` is resolved against the directory holding the
 * config file, so a config keeps pointing at the same table wherever the
 * process is started from.
 */
export function loadConfig(configPath: string = defaultConfigPath()): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigParseError(`${configPath}: ${errorMessage(error)}`);
  }

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  const config = result.data;
  return {
    ...config,
    storage: {
      ...config.storage,
      rootDir: resolve(dirname(resolve(configPath)), config.storage.rootDir),
    },
  };
}
