/**
 * BC3 Quotation Import
 *
 * Reads FIEBDC-3 (BC3) construction budget files, reconciles their concepts
 * against the catalog and assembles them into a quotation.
 */

export * from './models/index.js';
export * from './services/index.js';
export * from './repository/index.js';
export * from './errors.js';
export { loadConfig, config, ConfigError, type AppConfig } from './config/env.js';
export { logger, childLogger, type ImportLogger } from './logger.js';
