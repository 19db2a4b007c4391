export { formatNumber } from './numbers.js';
export { isBareKey, quote, stringify, stringifyKey, stringifyValue } from './serializer.js';
