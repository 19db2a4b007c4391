/**
 * @knit/format
 *
 * Parser and serializer for the knit configuration format: `key = value`
 * entries, `{ }` nested maps, `[ ]` arrays, `#` comments and `@name`
 * constants resolved at parse time.
 */

import { ParseError } from './errors.js';
import { Parser, type ParseOptions } from './parser/parser.js';
import type { Document } from './value/value.js';

export {
  LexError,
  LimitExceededError,
  ParseError,
  TruncatedInputError,
  UndefinedConstantError,
  UnexpectedTokenError,
} from './errors.js';
export type { ParseErrorKind } from './errors.js';

export { Lexer, matchToken, TokenKind } from './lexer/index.js';
export type { SourcePosition, Token, TokenMatch } from './lexer/index.js';

export { DEFAULT_LIMITS, EXPECTED_TOKENS, MAX_NESTING_DEPTH, Mode } from './parser/index.js';
export type { ParseLimits, ParseOptions } from './parser/index.js';

export { formatNumber, isBareKey, stringify, stringifyKey, stringifyValue } from './serializer/index.js';

export { cloneValue, fromJSON, isValueMap, toJSON, valueKind } from './value/index.js';
export type { Document, JsonObject, JsonValue, Value, ValueKind, ValueMap } from './value/index.js';

/**
 * Outcome of parse(): the document, or the first error encountered
 */
export type ParseResult =
  | { success: true; document: Document }
  | { success: false; error: ParseError };

/**
 * Parse knit text into a document
 *
 * Never throws for malformed input; an empty document and a failed parse
 * are told apart by `success`.
 *
 * @example
 * ```ts
 * const result = parse('@port = 8080\nserver = { port = @port }');
 * if (result.success) {
 *   result.document.get('server'); // => Map { 'port' => 8080 }
 * }
 * ```
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  try {
    return { success: true, document: new Parser(text, options).parse() };
  } catch (error) {
    if (error instanceof ParseError) {
      options.logger?.warn('parse_failed', {
        kind: error.kind,
        message: error.message,
        offset: error.position.offset,
      });
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Parse knit text into a document, throwing on malformed input
 *
 * @throws {LexError} If the text contains a character no token can start with
 * @throws {UnexpectedTokenError} If a token is out of place
 * @throws {TruncatedInputError} If the text ends inside an entry, map or array
 * @throws {UndefinedConstantError} If `@name` is used before it is declared
 * @throws {LimitExceededError} If the text is too long or nested too deeply
 */
export function parseOrThrow(text: string, options: ParseOptions = {}): Document {
  return new Parser(text, options).parse();
}
