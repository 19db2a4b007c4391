export { ConstantTable } from './constants.js';
export { fromJSON, toJSON } from './json.js';
export type { JsonObject, JsonValue } from './json.js';
export { cloneValue, isValueMap, valueKind } from './value.js';
export type { Document, Value, ValueKind, ValueMap } from './value.js';
