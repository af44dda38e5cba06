/**
 * Parsed key-value options of an annotation
 */

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);

export class Options {
  private values: Map<string, string>;

  constructor(values: Map<string, string> | Record<string, string> = {}) {
    this.values = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
  }

  /**
   * Value of `key`, or `def` when the key is absent or its value is empty
   */
  get(key: string, def: string): string {
    const value = this.values.get(key);
    return value !== undefined && value.length > 0 ? value : def;
  }

  /**
   * A key exists when present with an empty value or a boolean-true value
   */
  exist(key: string): boolean {
    const value = this.values.get(key);
    if (value === undefined) {
      return false;
    }
    return value.length === 0 || TRUE_VALUES.has(value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.values.entries());
  }

  get size(): number {
    return this.values.size;
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
