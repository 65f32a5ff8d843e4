// Public API: store factories, backends and the shared store contract.

export * from './storage/index.js';
export { createLogger } from './logger.js';
export type { LoggingConfig } from './logger.js';
export { ConfigSchema, loadConfig, defaultConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { ConfigInvalidError, ConfigMissingError, ConfigParseError } from './errors/index.js';
export type { AppError } from './errors/index.js';
