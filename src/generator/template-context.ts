/**
 * TemplateContext - Data handed to every section of a template
 *
 * An insertion-ordered key/value store. Builders fill in the base keys
 * (`PackageName`, `StructName`, `TableName`, `Fields` for tables); callers
 * may add any other key before rendering and every section will see it.
 */

import type { ContextValue, FieldSpec } from '../types/index.js';

export class TemplateContext {
  private readonly entries = new Map<string, ContextValue>();

  constructor(initial: Iterable<readonly [string, ContextValue]> = []) {
    for (const [key, value] of initial) {
      this.set(key, value);
    }
  }

  /**
   * Sets a key, keeping its original position when it already exists. The
   * context stores a frozen copy of the value.
   */
  set(key: string, value: ContextValue): this {
    this.entries.set(key, frozenCopy(value));
    return this;
  }

  get(key: string): ContextValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * String value of a key, or `''` when it is missing or not a string
   */
  getString(key: string): string {
    const value = this.entries.get(key);
    return typeof value === 'string' ? value : '';
  }

  /**
   * The `Fields` entry, or an empty list when absent
   */
  get fields(): readonly FieldSpec[] {
    const value = this.entries.get('Fields');
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter(isFieldSpec);
  }

  /**
   * Independent copy
   */
  clone(): TemplateContext {
    return new TemplateContext(this.entries);
  }

  /**
   * Plain object view used at render time, rebuilt on every call
   */
  toObject(): Record<string, ContextValue> {
    const result: Record<string, ContextValue> = {};
    for (const [key, value] of this.entries) {
      result[key] = value;
    }
    return result;
  }
}

/**
 * Type guard for field entries
 */
export function isFieldSpec(value: unknown): value is FieldSpec {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'Name' in value && typeof value.Name === 'string' &&
    'Type' in value && typeof value.Type === 'string' &&
    'Tag' in value && typeof value.Tag === 'string'
  );
}

// Deep copy frozen at every level; the caller keeps its own values mutable
function frozenCopy(value: ContextValue): ContextValue {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map(frozenCopy));
  }

  const copy: Record<string, ContextValue> = {};
  for (const [key, item] of Object.entries(value)) {
    copy[key] = frozenCopy(item);
  }
  return Object.freeze(copy);
}
