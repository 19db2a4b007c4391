/**
 * Error types for the knit format
 *
 * Every failure aborts the whole parse and carries the source text and the
 * position of the first offending character.
 */

import type { SourcePosition } from './lexer/token.js';
import type { TokenKind } from './lexer/token-types.js';
import type { Mode } from './parser/modes.js';

export type ParseErrorKind =
  | 'lex'
  | 'unexpected-token'
  | 'truncated-input'
  | 'undefined-constant'
  | 'limit-exceeded';

/**
 * Base class for parse errors
 */
export abstract class ParseError extends Error {
  abstract readonly kind: ParseErrorKind;
  /** The message without the position suffix */
  readonly reason: string;
  /** The document text that failed to parse */
  readonly source: string;
  readonly position: SourcePosition;

  constructor(message: string, source: string, position: SourcePosition) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(`${message} at line ${position.line}, column ${position.column + 1}`);
    this.name = this.constructor.name;
    this.reason = message;
    this.source = source;
    this.position = position;
  }
}

/**
 * Thrown when no lexer rule matches at a position
 */
export class LexError extends ParseError {
  readonly kind = 'lex';
}

/**
 * Thrown when a token is not valid in the current parser mode
 */
export class UnexpectedTokenError extends ParseError {
  readonly kind = 'unexpected-token';
  readonly found: TokenKind;
  readonly mode: Mode;
  readonly expected: TokenKind[];

  constructor(
    source: string,
    position: SourcePosition,
    found: TokenKind,
    mode: Mode,
    expected: Iterable<TokenKind>,
  ) {
    const expectedList = [...expected];
    super(
      `Unexpected ${found} in ${mode} mode (expected ${expectedList.join(', ')})`,
      source,
      position,
    );
    this.found = found;
    this.mode = mode;
    this.expected = expectedList;
  }
}

/**
 * Thrown when input ends while a key, value, array or nested map is still open
 */
export class TruncatedInputError extends ParseError {
  readonly kind = 'truncated-input';
  readonly mode: Mode;

  constructor(source: string, position: SourcePosition, mode: Mode) {
    super(`Unexpected end of input in ${mode} mode`, source, position);
    this.mode = mode;
  }
}

/**
 * Thrown when `@name` refers to a constant that was never declared
 */
export class UndefinedConstantError extends ParseError {
  readonly kind = 'undefined-constant';
  readonly constantName: string;

  constructor(source: string, position: SourcePosition, constantName: string) {
    super(`Undefined constant '@${constantName}'`, source, position);
    this.constantName = constantName;
  }
}

/**
 * Thrown when nesting depth or input length exceeds the configured limits
 */
export class LimitExceededError extends ParseError {
  readonly kind = 'limit-exceeded';
  readonly limit: 'maxDepth' | 'maxInputLength';

  constructor(
    message: string,
    source: string,
    position: SourcePosition,
    limit: 'maxDepth' | 'maxInputLength',
  ) {
    super(message, source, position);
    this.limit = limit;
  }
}
