/**
 * In-memory value model shared by the parser and the serializer
 */

export type Value = null | boolean | number | string | Value[] | ValueMap;

/**
 * Ordered, key-unique map. Insertion order is the serialization order.
 */
export type ValueMap = Map<string, Value>;

/** A parsed top-level document */
export type Document = ValueMap;

export type ValueKind = 'null' | 'bool' | 'number' | 'string' | 'array' | 'map';

export function valueKind(value: Value): ValueKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      return 'number';
    default:
      return 'string';
  }
}

export function isValueMap(value: Value): value is ValueMap {
  return value instanceof Map;
}

/**
 * Deep copy of a value. Scalars are returned as-is.
 */
export function cloneValue(value: Value): Value {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (value instanceof Map) {
    const copy: ValueMap = new Map();
    for (const [key, entry] of value) {
      copy.set(key, cloneValue(entry));
    }
    return copy;
  }
  return value;
}
