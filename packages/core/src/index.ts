// @plugin-runtime/core: config, logger, errors and utilities
export * from './config.js';
export { envSchema } from './config-schema.js';
export type { ParsedEnv } from './config-schema.js';
export { logger, setLogLevel, getLogLevel, maskSensitiveData } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { loadJson, saveJson, formatError, errorMessage } from './utils.js';
export { safeCompare } from './safe-compare.js';
export { ok, err, unwrap } from './result.js';
export type { Result } from './result.js';
export { PluginRuntimeError } from './errors.js';
export type { PluginErrorCode, LoadErrorCode } from './errors.js';
