/**
 * Validation functions for configuration and schema data
 */

import type {
  BaseType,
  ColumnSchema,
  ColumnType,
  ConstrainedBaseType,
  DatabaseSchema,
  GenerationConfig,
  LoggingConfig,
  ModelgenConfig,
  TableSchema
} from '../types/index.js';
import { SchemaError, ValidationError } from '../types/errors.js';
import { isIdentifier } from '../generator/name-normalizer.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['json', 'text'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function oneOf<T extends string>(values: readonly T[], value: unknown): T | undefined {
  return values.find(candidate => candidate === value);
}

/**
 * Whether a name can be used as a package clause
 */
export function isPackageName(name: string): boolean {
  return isIdentifier(name);
}

/**
 * Validates generation configuration
 */
export function validateGenerationConfig(config: unknown): GenerationConfig {
  if (!isRecord(config)) {
    throw new ValidationError('Generation config must be an object');
  }

  if (!config.outputDir || typeof config.outputDir !== 'string') {
    throw new ValidationError('Generation config must have a string outputDir', 'outputDir');
  }

  if (typeof config.packageName !== 'string' || !isPackageName(config.packageName)) {
    throw new ValidationError('packageName must be a valid package identifier', 'packageName', {
      packageName: config.packageName
    });
  }

  if (config.dryRun !== undefined && typeof config.dryRun !== 'boolean') {
    throw new ValidationError('dryRun must be a boolean', 'dryRun');
  }

  if (config.modelImport !== undefined && (typeof config.modelImport !== 'string' || !config.modelImport)) {
    throw new ValidationError('modelImport must be a non-empty string', 'modelImport');
  }

  if (config.acronyms !== undefined && !isStringArray(config.acronyms)) {
    throw new ValidationError('acronyms must be an array of strings', 'acronyms');
  }

  return {
    outputDir: config.outputDir,
    packageName: config.packageName,
    dryRun: typeof config.dryRun === 'boolean' ? config.dryRun : undefined,
    modelImport: typeof config.modelImport === 'string' ? config.modelImport : undefined,
    acronyms: isStringArray(config.acronyms) ? config.acronyms : undefined
  };
}

/**
 * Validates logging configuration
 */
export function validateLoggingConfig(config: unknown): LoggingConfig {
  if (!isRecord(config)) {
    throw new ValidationError('Logging config must be an object');
  }

  const level = oneOf(LOG_LEVELS, config.level);
  if (level === undefined) {
    throw new ValidationError(`Log level must be one of: ${LOG_LEVELS.join(', ')}`, 'level');
  }

  const format = oneOf(LOG_FORMATS, config.format);
  if (format === undefined) {
    throw new ValidationError(`Log format must be one of: ${LOG_FORMATS.join(', ')}`, 'format');
  }

  if (typeof config.includeTimestamp !== 'boolean') {
    throw new ValidationError('includeTimestamp must be a boolean', 'includeTimestamp');
  }

  if (typeof config.includeStackTrace !== 'boolean') {
    throw new ValidationError('includeStackTrace must be a boolean', 'includeStackTrace');
  }

  return {
    level,
    format,
    includeTimestamp: config.includeTimestamp,
    includeStackTrace: config.includeStackTrace
  };
}

/**
 * Validates the main model generator configuration
 */
export function validateModelgenConfig(config: unknown): ModelgenConfig {
  if (!isRecord(config)) {
    throw new ValidationError('Model generator config must be an object');
  }

  return {
    generation: validateGenerationConfig(config.generation),
    logging: validateLoggingConfig(config.logging)
  };
}

/**
 * Validates a parsed database schema document
 *
 * Column type names are not checked here; an unknown type surfaces as an
 * UnrecognizedTypeError when the table is generated.
 */
export function validateDatabaseSchema(schema: unknown): DatabaseSchema {
  if (!isRecord(schema)) {
    throw new SchemaError('Database schema must be an object');
  }

  if (!schema.name || typeof schema.name !== 'string') {
    throw new SchemaError('Database schema must have a string name', 'name');
  }

  if (typeof schema.version !== 'string') {
    throw new SchemaError('Database schema must have a string version', 'version');
  }

  if (schema.cksum !== undefined && typeof schema.cksum !== 'string') {
    throw new SchemaError('cksum must be a string', 'cksum');
  }

  if (!isRecord(schema.tables)) {
    throw new SchemaError('Database schema must have a tables object', 'tables');
  }

  const tables: Record<string, TableSchema> = {};
  for (const [tableName, table] of Object.entries(schema.tables)) {
    tables[tableName] = validateTableSchema(table, `tables.${tableName}`);
  }

  return {
    name: schema.name,
    version: schema.version,
    cksum: typeof schema.cksum === 'string' ? schema.cksum : undefined,
    tables
  };
}

/**
 * Validates the schema of a single table
 */
export function validateTableSchema(table: unknown, path = 'table'): TableSchema {
  if (!isRecord(table)) {
    throw new SchemaError('Table schema must be an object', path);
  }

  if (!isRecord(table.columns)) {
    throw new SchemaError('Table schema must have a columns object', `${path}.columns`);
  }

  const columns: Record<string, ColumnSchema> = {};
  for (const [columnName, column] of Object.entries(table.columns)) {
    columns[columnName] = validateColumnSchema(column, `${path}.columns.${columnName}`);
  }

  const { maxRows } = table;
  if (maxRows !== undefined && !isPositiveInteger(maxRows)) {
    throw new SchemaError('maxRows must be a positive integer', `${path}.maxRows`);
  }

  if (table.isRoot !== undefined && typeof table.isRoot !== 'boolean') {
    throw new SchemaError('isRoot must be a boolean', `${path}.isRoot`);
  }

  let indexes: string[][] | undefined;
  if (table.indexes !== undefined) {
    if (!Array.isArray(table.indexes)) {
      throw new SchemaError('indexes must be an array of column lists', `${path}.indexes`);
    }
    indexes = table.indexes.map((index: unknown, position) => {
      if (!isStringArray(index) || index.length === 0) {
        throw new SchemaError('Each index must be a non-empty array of column names', `${path}.indexes[${position}]`);
      }
      const missing = index.find(column => column !== '_uuid' && !Object.hasOwn(columns, column));
      if (missing !== undefined) {
        throw new SchemaError(`Index refers to unknown column "${missing}"`, `${path}.indexes[${position}]`);
      }
      return index;
    });
  }

  return {
    columns,
    maxRows: isPositiveInteger(maxRows) ? maxRows : undefined,
    isRoot: typeof table.isRoot === 'boolean' ? table.isRoot : undefined,
    indexes
  };
}

function validateColumnSchema(column: unknown, path: string): ColumnSchema {
  if (!isRecord(column)) {
    throw new SchemaError('Column schema must be an object', path);
  }

  let type: string | ColumnType;
  if (typeof column.type === 'string') {
    type = column.type;
  } else if (isRecord(column.type)) {
    type = validateColumnType(column.type, `${path}.type`);
  } else {
    throw new SchemaError('Column type must be a string or an object', `${path}.type`);
  }

  if (column.ephemeral !== undefined && typeof column.ephemeral !== 'boolean') {
    throw new SchemaError('ephemeral must be a boolean', `${path}.ephemeral`);
  }

  if (column.mutable !== undefined && typeof column.mutable !== 'boolean') {
    throw new SchemaError('mutable must be a boolean', `${path}.mutable`);
  }

  return {
    type,
    ephemeral: typeof column.ephemeral === 'boolean' ? column.ephemeral : undefined,
    mutable: typeof column.mutable === 'boolean' ? column.mutable : undefined
  };
}

function validateColumnType(type: Record<string, unknown>, path: string): ColumnType {
  const key = validateBaseType(type.key, `${path}.key`);
  const value = type.value === undefined ? undefined : validateBaseType(type.value, `${path}.value`);

  const min = type.min;
  if (min !== undefined && min !== 0 && min !== 1) {
    throw new SchemaError('min must be 0 or 1', `${path}.min`);
  }

  const max = type.max;
  if (max !== undefined && max !== 'unlimited' && !isPositiveInteger(max)) {
    throw new SchemaError('max must be a positive integer or "unlimited"', `${path}.max`);
  }

  return {
    key,
    value,
    min: typeof min === 'number' ? min : undefined,
    max: typeof max === 'number' || max === 'unlimited' ? max : undefined
  };
}

function validateBaseType(base: unknown, path: string): BaseType {
  if (typeof base === 'string') {
    return base;
  }

  if (!isRecord(base) || typeof base.type !== 'string') {
    throw new SchemaError('Base type must be a type name or an object with a string type', path);
  }

  const constrained: ConstrainedBaseType = { type: base.type };

  if (base.enum !== undefined) {
    constrained.enum = base.enum;
  }

  if (base.refTable !== undefined) {
    if (typeof base.refTable !== 'string') {
      throw new SchemaError('refTable must be a string', `${path}.refTable`);
    }
    constrained.refTable = base.refTable;
  }

  if (base.refType !== undefined) {
    if (base.refType !== 'strong' && base.refType !== 'weak') {
      throw new SchemaError('refType must be "strong" or "weak"', `${path}.refType`);
    }
    constrained.refType = base.refType;
  }

  for (const bound of ['minInteger', 'maxInteger', 'minReal', 'maxReal', 'minLength', 'maxLength'] as const) {
    const limit = base[bound];
    if (limit === undefined) {
      continue;
    }
    if (typeof limit !== 'number') {
      throw new SchemaError(`${bound} must be a number`, `${path}.${bound}`);
    }
    constrained[bound] = limit;
  }

  return constrained;
}
