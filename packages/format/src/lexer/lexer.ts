import { LexError } from '../errors.js';
import type { SourcePosition, Token } from './token.js';
import { TokenKind } from './token-types.js';

/**
 * A successful rule match at a given offset
 */
export interface TokenMatch {
  kind: TokenKind;
  content: string;
}

interface LexRule {
  kind: TokenKind;
  pattern: RegExp;
}

/**
 * Lexer rules in priority order. The first rule that matches at the scan
 * position wins, even when a later rule would match a longer run.
 * All patterns are sticky so they only match at `lastIndex`.
 */
const RULES: readonly LexRule[] = [
  { kind: TokenKind.STRING, pattern: /"(?:\\[\s\S]|[^"\\])*"/y },
  { kind: TokenKind.NUMBER, pattern: /-?\d+(?:\.\d+)?/y },
  { kind: TokenKind.AT, pattern: /@/y },
  { kind: TokenKind.WORD, pattern: /[^"\s#\\={}[\],]+/y },
  { kind: TokenKind.NEWLINE, pattern: /[^\S\r\n]*[\r\n]+/y },
  { kind: TokenKind.SEPARATOR, pattern: /(?:,|[^\S\r\n])+/y },
  { kind: TokenKind.EQUALS, pattern: /=/y },
  { kind: TokenKind.LBRACE, pattern: /\{/y },
  { kind: TokenKind.RBRACE, pattern: /\}/y },
  { kind: TokenKind.LBRACKET, pattern: /\[/y },
  { kind: TokenKind.RBRACKET, pattern: /\]/y },
  { kind: TokenKind.HASH, pattern: /#/y },
];

/**
 * Try every rule at `offset` and return the first match, or null when none
 * applies. Does not throw.
 */
export function matchToken(source: string, offset: number): TokenMatch | null {
  for (const rule of RULES) {
    rule.pattern.lastIndex = offset;
    const match = rule.pattern.exec(source);
    if (match) {
      return { kind: rule.kind, content: match[0] };
    }
  }
  return null;
}

/**
 * Lexer for the knit format
 *
 * Produces tokens lazily, one per call to next(). The parser consumes each
 * token immediately, so no token buffer is kept.
 */
export class Lexer {
  private readonly source: string;
  private offset: number = 0;
  private line: number = 1;
  private column: number = 0;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Read the next token. Returns an END token once the input is exhausted;
   * calling next() again after that keeps returning END.
   */
  next(): Token {
    const position = this.currentPosition();

    if (this.isAtEnd()) {
      return { kind: TokenKind.END, content: '', position };
    }

    const match = matchToken(this.source, this.offset);
    if (!match) {
      throw this.error();
    }

    this.advance(match.content);
    return { kind: match.kind, content: match.content, position };
  }

  /**
   * Skip raw text up to, but not including, the next line break.
   * Comment bodies are not tokenized, so they may hold any character.
   */
  skipLine(): void {
    let end = this.offset;
    while (end < this.source.length && this.source[end] !== '\n' && this.source[end] !== '\r') {
      end++;
    }
    this.advance(this.source.slice(this.offset, end));
  }

  private isAtEnd(): boolean {
    return this.offset >= this.source.length;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.offset,
    };
  }

  private advance(text: string): void {
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '\n' || (char === '\r' && text[i + 1] !== '\n')) {
        this.line++;
        this.column = 0;
      } else if (char !== '\r') {
        this.column++;
      }
    }
    this.offset += text.length;
  }

  private error(): LexError {
    const char = this.source[this.offset];
    const message =
      char === '"' ? 'Unterminated string literal' : `Unexpected character '${char}'`;
    return new LexError(message, this.source, this.currentPosition());
  }
}
