/**
 * NameNormalizer - Turns schema identifiers into exported identifiers
 *
 * Table and column names are split on `_` and `-`, each word is capitalized
 * and the words are joined. Words found in the acronym set are written fully
 * upper-cased, so `logical_ip` becomes `LogicalIP` rather than `LogicalIp`.
 */

import { KEYWORDS } from '../golang/token.js';

/**
 * Acronyms kept upper-cased in generated identifiers
 */
export const ACRONYMS: ReadonlySet<string> = new Set([
  'ACL',
  'API',
  'ARP',
  'BFD',
  'CPU',
  'DHCP',
  'DNS',
  'HTTP',
  'ID',
  'IP',
  'IPSEC',
  'JSON',
  'LB',
  'MAC',
  'MTU',
  'NAT',
  'QOS',
  'RPC',
  'SSL',
  'TCP',
  'TLS',
  'TTL',
  'UDP',
  'URL',
  'UUID',
  'VLAN',
]);

const SEPARATOR = /[_-]/;
const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Builds an acronym set from the defaults plus caller supplied words
 */
export function createAcronymSet(extra: Iterable<string> = []): ReadonlySet<string> {
  const acronyms = new Set(ACRONYMS);
  for (const word of extra) {
    const trimmed = word.trim();
    if (trimmed) {
      acronyms.add(trimmed.toUpperCase());
    }
  }
  return acronyms;
}

/**
 * Converts a separator-delimited identifier into an exported identifier
 */
export function camelCase(input: string, acronyms: ReadonlySet<string> = ACRONYMS): string {
  return input
    .split(SEPARATOR)
    .filter(word => word.length > 0)
    .map(word => normalizeWord(word, acronyms))
    .join('');
}

/**
 * Exported field name for a column
 */
export function fieldName(column: string, acronyms: ReadonlySet<string> = ACRONYMS): string {
  return camelCase(column, acronyms);
}

/**
 * Exported struct name for a table. `Foo_Bar` becomes `FooBar`.
 */
export function structName(table: string, acronyms: ReadonlySet<string> = ACRONYMS): string {
  return camelCase(table, acronyms);
}

/**
 * Whether a name can be declared as an identifier. Keywords and the blank
 * identifier are rejected.
 */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !KEYWORDS.has(name) && name !== '_';
}

/**
 * Name of the file a table's model is written to
 */
export function fileName(table: string): string {
  return `${table.toLowerCase()}.go`;
}

/**
 * Struct tag body for a column; the column name is kept as is
 */
export function tag(column: string): string {
  return `ovs:"${column}"`;
}

function normalizeWord(word: string, acronyms: ReadonlySet<string>): string {
  const upper = word.toUpperCase();
  if (acronyms.has(upper)) {
    return upper;
  }

  // plural acronym: ids -> IDs
  if (word.length > 1 && upper.endsWith('S')) {
    const stem = upper.slice(0, -1);
    if (acronyms.has(stem)) {
      return stem + word.slice(-1);
    }
  }

  return word.charAt(0).toUpperCase() + word.slice(1);
}
