import { matchToken } from '../lexer/lexer.js';
import { TokenKind } from '../lexer/token-types.js';
import type { Value, ValueMap } from '../value/value.js';
import { formatNumber } from './numbers.js';

/**
 * Escape `\` and `"` and wrap the text in double quotes
 */
export function quote(text: string): string {
  return `"${text.replace(/[\\"]/g, '\\$&')}"`;
}

/**
 * A key can be written bare when the lexer reads all of it back as a single
 * WORD or NUMBER token. Everything else (spaces, reserved characters, a
 * leading `@`, the empty key) is quoted.
 */
export function isBareKey(key: string): boolean {
  if (key.length === 0) {
    return false;
  }
  const match = matchToken(key, 0);
  return (
    match !== null &&
    (match.kind === TokenKind.WORD || match.kind === TokenKind.NUMBER) &&
    match.content.length === key.length
  );
}

export function stringifyKey(key: string): string {
  return isBareKey(key) ? key : quote(key);
}

/**
 * Render a single value as it appears on the right of `=`
 */
export function stringifyValue(value: Value): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(stringifyValue).join(', ')}]`;
  }
  if (value instanceof Map) {
    return `{${stringify(value, true)}}`;
  }
  switch (typeof value) {
    case 'string':
      return quote(value);
    case 'number':
      return formatNumber(value);
    default:
      return value ? 'true' : 'false';
  }
}

/**
 * Render a map as knit text, one `key = value` entry per line, or
 * comma-separated on one line when `inline` is set.
 *
 * @example
 * ```ts
 * stringify(new Map([['name', 'knit'], ['tags', ['a', 'b']]]))
 * // => 'name = "knit"\ntags = ["a", "b"]'
 * ```
 */
export function stringify(map: ValueMap, inline: boolean = false): string {
  const entries: string[] = [];
  for (const [key, value] of map) {
    entries.push(`${stringifyKey(key)} = ${stringifyValue(value)}`);
  }
  return entries.join(inline ? ', ' : '\n');
}
