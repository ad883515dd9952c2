/**
 * Error handling types and classes for the model generator
 */

/**
 * Categories of errors that can occur in the system
 */
export enum ErrorCategory {
  SCHEMA = 'schema',
  GENERATION = 'generation',
  TEMPLATE = 'template',
  FORMAT = 'format',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration'
}

/**
 * Base error class for all model generator errors
 */
export class ModelgenError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ModelgenError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelgenError);
    }
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      context: this.context,
      stack: this.stack,
      cause: this.cause?.message
    };
  }
}

/**
 * Error related to the shape of a database schema
 */
export class SchemaError extends ModelgenError {
  constructor(
    message: string,
    public readonly schemaPath?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.SCHEMA, { schemaPath, ...context }, cause);
    this.name = 'SchemaError';
  }
}

/**
 * Error raised while deriving or writing generated code
 */
export class GenerationError extends ModelgenError {
  constructor(
    message: string,
    public readonly tableName?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.GENERATION, { tableName, ...context }, cause);
    this.name = 'GenerationError';
  }
}

/**
 * A column's wire type has no target type
 */
export class UnrecognizedTypeError extends GenerationError {
  constructor(
    public readonly columnName: string,
    public readonly typeToken: string,
    tableName?: string
  ) {
    const where = tableName ? `${tableName}.${columnName}` : columnName;
    super(`Unrecognized type "${typeToken}" for column ${where}`, tableName, {
      columnName,
      typeToken
    });
    this.name = 'UnrecognizedTypeError';
  }
}

/**
 * Two columns normalize to the same field name
 */
export class DuplicateFieldError extends GenerationError {
  constructor(
    public readonly fieldName: string,
    public readonly columns: readonly string[],
    tableName?: string
  ) {
    super(
      `Columns ${columns.map(column => `"${column}"`).join(', ')} all map to field ${fieldName}`,
      tableName,
      { fieldName, columns }
    );
    this.name = 'DuplicateFieldError';
  }
}

/**
 * A template section supplied by a caller could not be parsed
 */
export class HookParseError extends ModelgenError {
  constructor(
    message: string,
    public readonly hookName: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.TEMPLATE, { hookName, ...context }, cause);
    this.name = 'HookParseError';
  }
}

/**
 * Which step of formatting failed
 */
export type FormatPhase = 'render' | 'validate';

/**
 * Rendered output failed to render or is not well-formed source
 */
export class FormatError extends ModelgenError {
  constructor(
    message: string,
    public readonly phase: FormatPhase,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.FORMAT, { phase, ...context }, cause);
    this.name = 'FormatError';
  }
}

/**
 * Error related to input validation
 */
export class ValidationError extends ModelgenError {
  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.VALIDATION, { field, ...context }, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error related to configuration issues
 */
export class ConfigurationError extends ModelgenError {
  constructor(
    message: string,
    public readonly configPath?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.CONFIGURATION, { configPath, ...context }, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Union type for errors surfaced while producing a single file
 */
export type ModelOutputError = GenerationError | HookParseError | FormatError;

/**
 * Union type for all possible errors
 */
export type AnyModelgenError =
  | SchemaError
  | GenerationError
  | HookParseError
  | FormatError
  | ValidationError
  | ConfigurationError;
