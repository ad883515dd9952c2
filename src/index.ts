/**
 * ovsdb-modelgen - typed model generation from OVSDB schemas
 */

export * from './types/index.js';
export * from './generator/index.js';
export { GoSyntaxError, formatSource, parseSource, type SourceFile, type Declaration } from './golang/index.js';
export { DEFAULT_CONFIG, DEFAULT_MODEL_IMPORT, resolveConfig, type ConfigOverrides } from './utils/config.js';
export { createLogger, createSilentLogger } from './utils/logger.js';
export {
  isPackageName,
  validateDatabaseSchema,
  validateGenerationConfig,
  validateLoggingConfig,
  validateModelgenConfig,
  validateTableSchema
} from './utils/validation.js';
