// Public API.

export * from './cas/index.js';
export * from './entry/index.js';
export * from './hash-table/index.js';
export * from './errors/index.js';
export { defaultConfigPath, loadConfig, ConfigSchema, StorageConfigSchema } from './config/index.js';
export type { Config, StorageConfig } from './config/index.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
