/**
 * Public library surface.
 */

export * from './context-builder.js';
export * from './orchestrator.js';
export * from './system.js';
export * from '../memory/index.js';
export * from '../adapters/index.js';
export * from '../errors.js';
export { createLogger, silentLogger } from '../utils/logger.js';
export type { Logger, LogLevel, LoggerOptions } from '../utils/logger.js';
export { loadConfig, resolveCredentials, ConfigSchema } from '../config/index.js';
export type { Config, Credentials, CredentialEnv } from '../config/index.js';
