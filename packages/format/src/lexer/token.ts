import type { TokenKind } from './token-types.js';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of input */
  offset: number;
}

/**
 * A token produced by the lexer
 */
export interface Token {
  readonly kind: TokenKind;
  /** The raw text matched in the source, quotes included for strings */
  readonly content: string;
  readonly position: SourcePosition;
}
