/**
 * Unit tests for identifier normalization
 */

import { describe, it, expect } from 'vitest';
import {
  ACRONYMS,
  camelCase,
  createAcronymSet,
  fieldName,
  fileName,
  isIdentifier,
  structName,
  tag
} from '../../src/generator/name-normalizer.js';

describe('camelCase', () => {
  it.each([
    ['foo_bar', 'FooBar'],
    ['Foo_Bar', 'FooBar'],
    ['other-config', 'OtherConfig'],
    ['fooBar', 'FooBar'],
    ['str', 'Str'],
    ['a', 'A'],
  ])('should convert %s to %s', (input, expected) => {
    expect(camelCase(input)).toBe(expected);
  });

  it('should upper-case known acronyms', () => {
    expect(camelCase('logical_ip')).toBe('LogicalIP');
    expect(camelCase('vlan_mode')).toBe('VLANMode');
    expect(camelCase('_uuid')).toBe('UUID');
  });

  it('should keep the plural suffix of an acronym lower-case', () => {
    expect(camelCase('external_ids')).toBe('ExternalIDs');
    expect(camelCase('ips')).toBe('IPs');
  });

  it('should drop empty words from repeated separators', () => {
    expect(camelCase('__a__b_')).toBe('AB');
  });

  it('should return an empty string for separator-only input', () => {
    expect(camelCase('')).toBe('');
    expect(camelCase('_-_')).toBe('');
  });

  it('should use a caller supplied acronym set', () => {
    const acronyms = createAcronymSet(['ovn', ' nb ']);
    expect(camelCase('ovn_nb_global', acronyms)).toBe('OVNNBGlobal');
    expect(camelCase('ovn_nb_global')).toBe('OvnNbGlobal');
  });
});

describe('createAcronymSet', () => {
  it('should extend the defaults without modifying them', () => {
    const acronyms = createAcronymSet(['stp']);

    expect(acronyms.has('STP')).toBe(true);
    expect(acronyms.has('IP')).toBe(true);
    expect(ACRONYMS.has('STP')).toBe(false);
  });

  it('should ignore blank entries', () => {
    expect(createAcronymSet(['', '  ']).size).toBe(ACRONYMS.size);
  });
});

describe('fieldName and structName', () => {
  it('should normalize column and table names the same way', () => {
    expect(fieldName('logical_port')).toBe('LogicalPort');
    expect(structName('Logical_Switch_Port')).toBe('LogicalSwitchPort');
    expect(structName('ACL')).toBe('ACL');
  });
});

describe('fileName', () => {
  it('should lower-case the table name and add the extension', () => {
    expect(fileName('Logical_Switch')).toBe('logical_switch.go');
    expect(fileName('ACL')).toBe('acl.go');
  });
});

describe('tag', () => {
  it('should keep the column name exactly as written', () => {
    expect(tag('external_ids')).toBe('ovs:"external_ids"');
    expect(tag('Mixed-Case')).toBe('ovs:"Mixed-Case"');
  });
});

describe('isIdentifier', () => {
  it('should accept exported and unexported names', () => {
    expect(isIdentifier('LogicalSwitch')).toBe(true);
    expect(isIdentifier('_private')).toBe(true);
    expect(isIdentifier('Größe')).toBe(true);
  });

  it('should reject names that cannot be declared', () => {
    expect(isIdentifier('')).toBe(false);
    expect(isIdentifier('_')).toBe(false);
    expect(isIdentifier('9lives')).toBe(false);
    expect(isIdentifier('range')).toBe(false);
    expect(isIdentifier('Other-Config')).toBe(false);
  });
});
