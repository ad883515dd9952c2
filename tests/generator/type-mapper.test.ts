/**
 * Unit tests for column type mapping
 */

import { describe, it, expect } from 'vitest';
import {
  ATOMIC_TYPE_MAP,
  atomicType,
  baseTypeName,
  fieldType,
  isAtomicTypeName,
  isOptional,
  isSet,
  TypeMapper
} from '../../src/generator/type-mapper.js';
import { UnrecognizedTypeError } from '../../src/types/errors.js';

const location = { tableName: 'Bridge', columnName: 'ports' };

describe('atomicType', () => {
  it('should map every atomic wire type', () => {
    expect(atomicType('integer')).toBe('int');
    expect(atomicType('real')).toBe('float64');
    expect(atomicType('boolean')).toBe('bool');
    expect(atomicType('string')).toBe('string');
    expect(atomicType('uuid')).toBe('string');
  });

  it('should return an empty string for unknown names', () => {
    expect(atomicType('decimal')).toBe('');
    expect(atomicType('toString')).toBe('');
  });

  it('should only recognize own keys of the type map', () => {
    expect(isAtomicTypeName('constructor')).toBe(false);
    expect(Object.keys(ATOMIC_TYPE_MAP).every(isAtomicTypeName)).toBe(true);
  });
});

describe('baseTypeName', () => {
  it('should accept both base type forms', () => {
    expect(baseTypeName('integer')).toBe('integer');
    expect(baseTypeName({ type: 'uuid', refTable: 'Port' })).toBe('uuid');
  });
});

describe('fieldType', () => {
  it('should map atomic columns', () => {
    expect(fieldType({ type: 'real' }, location)).toBe('float64');
  });

  it('should map a required single element to the element type', () => {
    expect(fieldType({ type: { key: 'string' } }, location)).toBe('string');
    expect(fieldType({ type: { key: 'string', min: 1, max: 1 } }, location)).toBe('string');
  });

  it('should map an optional element to a pointer', () => {
    expect(fieldType({ type: { key: 'integer', min: 0, max: 1 } }, location)).toBe('*int');
  });

  it('should map sets to slices', () => {
    expect(fieldType({ type: { key: { type: 'uuid', refTable: 'Port' }, min: 0, max: 'unlimited' } }, location)).toBe(
      '[]string'
    );
    expect(fieldType({ type: { key: 'integer', min: 1, max: 4 } }, location)).toBe('[]int');
  });

  it('should map key/value columns to maps', () => {
    expect(fieldType({ type: { key: 'string', value: 'string', min: 0, max: 'unlimited' } }, location)).toBe(
      'map[string]string'
    );
    expect(fieldType({ type: { key: 'integer', value: { type: 'boolean' } } }, location)).toBe('map[int]bool');
  });

  it('should throw UnrecognizedTypeError naming the column', () => {
    expect(() => fieldType({ type: 'decimal' }, location)).toThrow(UnrecognizedTypeError);
    expect(() => fieldType({ type: 'decimal' }, location)).toThrow(
      'Unrecognized type "decimal" for column Bridge.ports'
    );
  });

  it('should reject unknown map value types', () => {
    let thrown: unknown;
    try {
      fieldType({ type: { key: 'string', value: 'blob' } }, { columnName: 'data' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(UnrecognizedTypeError);
    expect(thrown).toMatchObject({
      typeToken: 'blob',
      columnName: 'data',
      message: 'Unrecognized type "blob" for column data'
    });
  });
});

describe('isOptional and isSet', () => {
  it('should classify complex types', () => {
    expect(isOptional({ key: 'string', min: 0 })).toBe(true);
    expect(isOptional({ key: 'string', min: 0, max: 2 })).toBe(false);
    expect(isOptional({ key: 'string', value: 'string', min: 0 })).toBe(false);
    expect(isSet({ key: 'string', max: 'unlimited' })).toBe(true);
    expect(isSet({ key: 'string', max: 1 })).toBe(false);
    expect(isSet({ key: 'string', value: 'string', max: 'unlimited' })).toBe(false);
  });
});

describe('TypeMapper', () => {
  it('should apply its type map to every element type', () => {
    const mapper = new TypeMapper({ typeMap: { integer: 'int64', uuid: 'UUID' } });

    expect(mapper.atomicType('integer')).toBe('int64');
    expect(mapper.atomicType('real')).toBe('float64');
    expect(mapper.fieldType({ type: { key: 'uuid', value: 'integer' } }, location)).toBe('map[UUID]int64');
    expect(mapper.fieldType({ type: { key: 'integer', max: 'unlimited' } }, location)).toBe('[]int64');
  });

  it('should leave the default mapping alone', () => {
    const custom = new TypeMapper({ typeMap: { string: 'Text' } });

    expect(custom.atomicType('string')).toBe('Text');
    expect(atomicType('string')).toBe('string');
    expect(new TypeMapper().atomicType('string')).toBe('string');
  });

  it('should still reject unknown wire types', () => {
    const mapper = new TypeMapper({ typeMap: { integer: 'int64' } });
    expect(mapper.atomicType('decimal')).toBe('');
    expect(() => mapper.fieldType({ type: 'decimal' }, location)).toThrow(UnrecognizedTypeError);
  });
});
