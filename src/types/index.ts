/**
 * Core data models and interfaces for the model generator
 */

// Re-export error types
export * from './errors.js';
import type { GenerationError } from './errors.js';

/**
 * Atomic column types understood by the database
 */
export type AtomicTypeName = 'integer' | 'real' | 'boolean' | 'string' | 'uuid';

/**
 * Base type of a column's key or value, either the bare type name or the
 * constrained form
 */
export type BaseType = string | ConstrainedBaseType;

/**
 * Base type carrying constraints
 */
export interface ConstrainedBaseType {
  type: string;
  enum?: unknown;
  refTable?: string;
  refType?: 'strong' | 'weak';
  minInteger?: number;
  maxInteger?: number;
  minReal?: number;
  maxReal?: number;
  minLength?: number;
  maxLength?: number;
}

/**
 * Complex column type: optional, set or map valued
 */
export interface ColumnType {
  key: BaseType;
  value?: BaseType;
  /** Minimum number of elements (0 or 1, default 1) */
  min?: number;
  /** Maximum number of elements (default 1) */
  max?: number | 'unlimited';
}

/**
 * Schema of a single column
 */
export interface ColumnSchema {
  type: string | ColumnType;
  ephemeral?: boolean;
  mutable?: boolean;
}

/**
 * Schema of a single table
 */
export interface TableSchema {
  columns: Record<string, ColumnSchema>;
  maxRows?: number;
  isRoot?: boolean;
  indexes?: string[][];
}

/**
 * Parsed database schema
 */
export interface DatabaseSchema {
  name: string;
  version: string;
  cksum?: string;
  tables: Record<string, TableSchema>;
}

/**
 * One generated struct field
 */
export interface FieldSpec {
  /** Exported identifier */
  readonly Name: string;
  /** Target type expression */
  readonly Type: string;
  /** Column name exactly as the schema spells it */
  readonly Tag: string;
}

/**
 * Values a template context can hold
 */
export type ContextValue =
  | string
  | number
  | boolean
  | null
  | FieldSpec
  | ContextRecord
  | readonly ContextValue[];

/**
 * Nested record value inside a template context
 */
export interface ContextRecord {
  readonly [key: string]: ContextValue;
}

/**
 * Configuration for model generation
 */
export interface GenerationConfig {
  /** Directory generated files are written to */
  outputDir: string;
  /** Package clause of every generated file */
  packageName: string;
  /** Print generated files instead of writing them */
  dryRun?: boolean;
  /** Import path of the client model package */
  modelImport?: string;
  /** Extra acronyms to keep fully upper-cased in identifiers */
  acronyms?: string[];
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  /** Log level (debug, info, warn, error) */
  level: 'debug' | 'info' | 'warn' | 'error';
  /** Output format (json, text) */
  format: 'json' | 'text';
  /** Whether to include timestamps */
  includeTimestamp: boolean;
  /** Whether to include stack traces in error logs */
  includeStackTrace: boolean;
}

/**
 * Main configuration for the model generator
 */
export interface ModelgenConfig {
  /** Generation settings */
  generation: GenerationConfig;
  /** Logging configuration */
  logging: LoggingConfig;
}

/**
 * Result of a whole-database generation run
 */
export interface GenerationResult {
  /** Whether generation completed successfully */
  success: boolean;
  /** Generated file paths */
  generatedFiles: string[];
  /** Any warnings encountered during generation */
  warnings: string[];
  /** Error information if generation failed */
  error?: GenerationError;
}
