import { cloneValue, type Value } from './value.js';

/**
 * Constants declared with `@name = value` during one parse.
 *
 * A single table is shared by reference across every nested map and array of
 * a document, so a declaration is visible to all later references in the
 * same document. Each parse creates its own table.
 */
export class ConstantTable {
  private readonly values = new Map<string, Value>();

  /**
   * Returns a deep copy so substitutions never share structure,
   * or undefined when the name was never declared.
   */
  get(name: string): Value | undefined {
    const value = this.values.get(name);
    return value === undefined ? undefined : cloneValue(value);
  }

  set(name: string, value: Value): void {
    this.values.set(name, value);
  }

  get size(): number {
    return this.values.size;
  }
}
