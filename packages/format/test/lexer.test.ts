import { describe, expect, it } from 'vitest';
import { LexError } from '../src/errors.js';
import { Lexer, matchToken, TokenKind, type Token } from '../src/lexer/index.js';

function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.next();
    tokens.push(token);
    if (token.kind === TokenKind.END) return tokens;
  }
}

function tokenKinds(input: string): string[] {
  return tokenize(input).map((t) => t.kind);
}

function tokenContents(input: string): string[] {
  return tokenize(input).map((t) => t.content);
}

describe('Lexer', () => {
  describe('entries', () => {
    it('tokenizes a simple entry', () => {
      expect(tokenKinds('a = 1')).toEqual([
        TokenKind.WORD,
        TokenKind.SEPARATOR,
        TokenKind.EQUALS,
        TokenKind.SEPARATOR,
        TokenKind.NUMBER,
        TokenKind.END,
      ]);
    });

    it('tokenizes punctuation', () => {
      expect(tokenKinds('{}[]=#@')).toEqual([
        TokenKind.LBRACE,
        TokenKind.RBRACE,
        TokenKind.LBRACKET,
        TokenKind.RBRACKET,
        TokenKind.EQUALS,
        TokenKind.HASH,
        TokenKind.AT,
        TokenKind.END,
      ]);
    });

    it('returns END repeatedly once input is exhausted', () => {
      const lexer = new Lexer('x');
      expect(lexer.next().kind).toBe(TokenKind.WORD);
      expect(lexer.next().kind).toBe(TokenKind.END);
      expect(lexer.next().kind).toBe(TokenKind.END);
    });

    it('returns END for empty input', () => {
      expect(tokenKinds('')).toEqual([TokenKind.END]);
    });
  });

  describe('strings', () => {
    it('keeps quotes in the token content', () => {
      const [token] = tokenize('"hello world"');
      expect(token.kind).toBe(TokenKind.STRING);
      expect(token.content).toBe('"hello world"');
    });

    it('does not end on an escaped quote', () => {
      expect(tokenContents('"say \\"hi\\"" x')).toEqual(['"say \\"hi\\""', ' ', 'x', '']);
    });

    it('ends after an escaped backslash', () => {
      expect(tokenContents('"a\\\\" b')).toEqual(['"a\\\\"', ' ', 'b', '']);
    });

    it('may span lines', () => {
      const tokens = tokenize('"one\ntwo" x');
      expect(tokens[0].content).toBe('"one\ntwo"');
      expect(tokens[2].position).toEqual({ line: 2, column: 5, offset: 10 });
    });

    it('throws on unterminated strings', () => {
      expect(() => tokenize('"unterminated')).toThrow(LexError);
      expect(() => tokenize('"unterminated')).toThrow(
        'Unterminated string literal at line 1, column 1',
      );
    });
  });

  describe('numbers', () => {
    it('tokenizes integers and decimals', () => {
      expect(tokenContents('42 3.14 -7 -0.5')).toEqual(['42', ' ', '3.14', ' ', '-7', ' ', '-0.5', '']);
      expect(tokenKinds('-0.5')[0]).toBe(TokenKind.NUMBER);
    });

    it('does not consume a trailing dot', () => {
      expect(tokenKinds('1.')).toEqual([TokenKind.NUMBER, TokenKind.WORD, TokenKind.END]);
      expect(tokenContents('1.')).toEqual(['1', '.', '']);
    });

    it('matches before words', () => {
      expect(tokenContents('123abc')).toEqual(['123', 'abc', '']);
      expect(tokenKinds('123abc')).toEqual([TokenKind.NUMBER, TokenKind.WORD, TokenKind.END]);
    });

    it('treats a lone minus as a word', () => {
      expect(tokenKinds('-x')).toEqual([TokenKind.WORD, TokenKind.END]);
    });
  });

  describe('words', () => {
    it('has no keywords', () => {
      expect(tokenKinds('true false null')).toEqual([
        TokenKind.WORD,
        TokenKind.SEPARATOR,
        TokenKind.WORD,
        TokenKind.SEPARATOR,
        TokenKind.WORD,
        TokenKind.END,
      ]);
    });

    it('allows paths, urls and inner @', () => {
      expect(tokenContents('/usr/bin http://host:80/x user@host')).toEqual([
        '/usr/bin',
        ' ',
        'http://host:80/x',
        ' ',
        'user@host',
        '',
      ]);
    });

    it('stops at reserved characters', () => {
      expect(tokenContents('a,b=c#d{e}f[g]h"i"')).toEqual([
        'a', ',', 'b', '=', 'c', '#', 'd', '{', 'e', '}', 'f', '[', 'g', ']', 'h', '"i"', '',
      ]);
    });

    it('reads a leading @ as its own token', () => {
      expect(tokenKinds('@name')).toEqual([TokenKind.AT, TokenKind.WORD, TokenKind.END]);
    });
  });

  describe('whitespace', () => {
    it('folds trailing spaces and blank lines into one NEWLINE', () => {
      expect(tokenContents('a  \n\n b')).toEqual(['a', '  \n\n', ' ', 'b', '']);
      expect(tokenKinds('a  \n\n b')).toEqual([
        TokenKind.WORD,
        TokenKind.NEWLINE,
        TokenKind.SEPARATOR,
        TokenKind.WORD,
        TokenKind.END,
      ]);
    });

    it('treats commas as separators', () => {
      expect(tokenContents('1, 2,3')).toEqual(['1', ', ', '2', ',', '3', '']);
      expect(tokenKinds('1, 2')[1]).toBe(TokenKind.SEPARATOR);
    });

    it('keeps a comma before a line break apart from the NEWLINE', () => {
      expect(tokenKinds('1,\n2')).toEqual([
        TokenKind.NUMBER,
        TokenKind.SEPARATOR,
        TokenKind.NEWLINE,
        TokenKind.NUMBER,
        TokenKind.END,
      ]);
    });
  });

  describe('positions', () => {
    it('tracks line, column and offset', () => {
      const tokens = tokenize('a = 1\nb = 2');
      expect(tokens[6].content).toBe('b');
      expect(tokens[6].position).toEqual({ line: 2, column: 0, offset: 6 });
    });

    it('counts CRLF as one line break', () => {
      const tokens = tokenize('a\r\nb');
      expect(tokens[2].position).toEqual({ line: 2, column: 0, offset: 3 });
    });
  });

  describe('errors', () => {
    it('throws on a bare backslash instead of looping', () => {
      expect(() => tokenize('a = \\x')).toThrow(LexError);
      expect(() => tokenize('a = \\x')).toThrow("Unexpected character '\\' at line 1, column 5");
    });

    it('reports the error position', () => {
      try {
        tokenize('a\n  \\');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LexError);
        if (error instanceof LexError) {
          expect(error.kind).toBe('lex');
          expect(error.position).toEqual({ line: 2, column: 2, offset: 4 });
        }
      }
    });
  });

  describe('skipLine', () => {
    it('skips raw text up to the line break', () => {
      const lexer = new Lexer('# a \\ { "\nb');
      expect(lexer.next().kind).toBe(TokenKind.HASH);
      lexer.skipLine();
      const newline = lexer.next();
      expect(newline.kind).toBe(TokenKind.NEWLINE);
      expect(newline.position).toEqual({ line: 1, column: 9, offset: 9 });
      expect(lexer.next().content).toBe('b');
    });

    it('stops at end of input', () => {
      const lexer = new Lexer('# tail');
      lexer.next();
      lexer.skipLine();
      expect(lexer.next().kind).toBe(TokenKind.END);
    });
  });

  describe('matchToken', () => {
    it('returns the first matching rule', () => {
      expect(matchToken(' x', 0)).toEqual({ kind: TokenKind.SEPARATOR, content: ' ' });
      expect(matchToken(' x', 1)).toEqual({ kind: TokenKind.WORD, content: 'x' });
    });

    it('returns null when nothing matches', () => {
      expect(matchToken('\\', 0)).toBeNull();
    });
  });
});
