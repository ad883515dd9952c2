/**
 * Default configuration and override resolution
 */

import type { GenerationConfig, LoggingConfig, ModelgenConfig } from '../types/index.js';
import { ConfigurationError, ValidationError } from '../types/errors.js';
import { validateGenerationConfig, validateLoggingConfig } from './validation.js';

export const DEFAULT_MODEL_IMPORT = 'github.com/ovn-org/libovsdb/model';

export const DEFAULT_CONFIG: ModelgenConfig = {
  generation: {
    outputDir: '.',
    packageName: 'model',
    dryRun: false,
    modelImport: DEFAULT_MODEL_IMPORT,
    acronyms: []
  },
  logging: {
    level: 'warn',
    format: 'json',
    includeTimestamp: true,
    includeStackTrace: true
  }
};

/**
 * Partial configuration accepted by resolveConfig
 */
export interface ConfigOverrides {
  generation?: Partial<GenerationConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Merges overrides onto the defaults and validates the result
 *
 * @throws {ConfigurationError} When the merged configuration is invalid
 */
export function resolveConfig(overrides: ConfigOverrides = {}): ModelgenConfig {
  const generation = { ...DEFAULT_CONFIG.generation, ...overrides.generation };
  const logging = { ...DEFAULT_CONFIG.logging, ...overrides.logging };

  return {
    generation: validateSection('generation', () => validateGenerationConfig(generation)),
    logging: validateSection('logging', () => validateLoggingConfig(logging))
  };
}

function validateSection<T>(section: string, validate: () => T): T {
  try {
    return validate();
  } catch (error) {
    if (error instanceof ValidationError) {
      const configPath = error.field ? `${section}.${error.field}` : section;
      throw new ConfigurationError(`Invalid ${section} configuration: ${error.message}`, configPath, undefined, error);
    }
    throw error;
  }
}
