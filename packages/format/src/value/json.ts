import type { Document, Value, ValueMap } from './value.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Convert a document to plain JSON-compatible data.
 * Maps become objects; non-finite numbers become null, as in JSON.stringify.
 */
export function toJSON(document: Document): JsonObject {
  return mapToObject(document);
}

function mapToObject(map: ValueMap): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of map) {
    // Define rather than assign, so a `__proto__` key stays an own property
    Object.defineProperty(result, key, {
      value: valueToJson(value),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

function valueToJson(value: Value): JsonValue {
  if (Array.isArray(value)) {
    return value.map(valueToJson);
  }
  if (value instanceof Map) {
    return mapToObject(value);
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

/**
 * Convert plain data (for example the output of JSON.parse) to a document.
 *
 * @throws {TypeError} If the input is not a plain object or holds a value
 *   the format cannot represent
 */
export function fromJSON(data: unknown): Document {
  if (!isPlainObject(data)) {
    throw new TypeError('fromJSON requires a plain object at the top level');
  }
  return objectToMap(data, '');
}

function isPlainObject(data: unknown): data is Record<string, unknown> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(data);
  return proto === Object.prototype || proto === null;
}

function objectToMap(data: Record<string, unknown>, path: string): ValueMap {
  const map: ValueMap = new Map();
  for (const [key, entry] of Object.entries(data)) {
    map.set(key, jsonToValue(entry, path ? `${path}.${key}` : key));
  }
  return map;
}

function jsonToValue(data: unknown, path: string): Value {
  if (data === null || typeof data === 'boolean' || typeof data === 'string') {
    return data;
  }
  if (typeof data === 'number') {
    if (!Number.isFinite(data)) {
      throw new TypeError(`Non-finite number at '${path}' cannot be represented`);
    }
    return data;
  }
  if (Array.isArray(data)) {
    return data.map((item, index) => jsonToValue(item, `${path}[${index}]`));
  }
  if (isPlainObject(data)) {
    return objectToMap(data, path);
  }
  throw new TypeError(`Unsupported ${typeof data} value at '${path}'`);
}
