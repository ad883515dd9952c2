/**
 * TypeMapper - Converts column types into target type expressions
 *
 * Atomic wire types map to primitives. Complex columns wrap their element
 * type: optional columns become pointers, sets become slices and maps
 * become maps from key type to value type.
 */

import type { AtomicTypeName, BaseType, ColumnSchema, ColumnType } from '../types/index.js';
import { UnrecognizedTypeError } from '../types/errors.js';

/**
 * Maps atomic wire types to target primitive types
 */
export const ATOMIC_TYPE_MAP: Readonly<Record<AtomicTypeName, string>> = {
  integer: 'int',
  real: 'float64',
  boolean: 'bool',
  string: 'string',
  // references are kept as opaque row identifiers
  uuid: 'string',
};

/**
 * Where a column lives, for error reporting
 */
export interface ColumnLocation {
  tableName?: string;
  columnName: string;
}

/**
 * Checks whether a wire type name is one of the atomic types
 */
export function isAtomicTypeName(wireType: string): wireType is AtomicTypeName {
  return Object.hasOwn(ATOMIC_TYPE_MAP, wireType);
}

/**
 * Options for type mapping
 */
export interface TypeMapperOptions {
  /** Replacement target types for some atomic wire types */
  typeMap?: Partial<Record<AtomicTypeName, string>>;
}

/**
 * TypeMapper class for converting column types into field types
 */
export class TypeMapper {
  private options: Required<TypeMapperOptions>;

  constructor(options: TypeMapperOptions = {}) {
    this.options = {
      typeMap: options.typeMap ?? {},
    };
  }

  /**
   * Maps an atomic wire type name to its primitive type, or to `''` when the
   * name is not recognized
   */
  atomicType(wireType: string): string {
    if (!isAtomicTypeName(wireType)) {
      return '';
    }
    return this.options.typeMap[wireType] ?? ATOMIC_TYPE_MAP[wireType];
  }

  /**
   * Maps a column to its field type expression
   *
   * @throws {UnrecognizedTypeError} When any element type cannot be mapped
   */
  fieldType(column: ColumnSchema, location: ColumnLocation): string {
    if (typeof column.type === 'string') {
      return this.resolveAtomic(column.type, location);
    }
    return this.complexType(column.type, location);
  }

  private complexType(type: ColumnType, location: ColumnLocation): string {
    const key = this.resolveAtomic(baseTypeName(type.key), location);

    if (type.value !== undefined) {
      const value = this.resolveAtomic(baseTypeName(type.value), location);
      return `map[${key}]${value}`;
    }

    if (isOptional(type)) {
      return `*${key}`;
    }

    if (isSet(type)) {
      return `[]${key}`;
    }

    return key;
  }

  private resolveAtomic(wireType: string, location: ColumnLocation): string {
    const mapped = this.atomicType(wireType);
    if (mapped === '') {
      throw new UnrecognizedTypeError(location.columnName, wireType, location.tableName);
    }
    return mapped;
  }
}

const defaultMapper = new TypeMapper();

/**
 * Maps an atomic wire type name with the default type map
 */
export function atomicType(wireType: string): string {
  return defaultMapper.atomicType(wireType);
}

/**
 * Maps a column to its field type expression with the default type map
 *
 * @throws {UnrecognizedTypeError} When any element type cannot be mapped
 */
export function fieldType(column: ColumnSchema, location: ColumnLocation): string {
  return defaultMapper.fieldType(column, location);
}

/**
 * Whether a complex type holds at most one optional element
 */
export function isOptional(type: ColumnType): boolean {
  return type.value === undefined && (type.min ?? 1) === 0 && (type.max ?? 1) === 1;
}

/**
 * Whether a complex type holds more than one element
 */
export function isSet(type: ColumnType): boolean {
  const max = type.max ?? 1;
  return type.value === undefined && (max === 'unlimited' || max > 1);
}

/**
 * Name of the atomic type underneath a base type
 */
export function baseTypeName(base: BaseType): string {
  return typeof base === 'string' ? base : base.type;
}
