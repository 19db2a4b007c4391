import { TokenKind } from '../lexer/token-types.js';

/**
 * Parser modes. The top of a frame's mode stack decides which tokens are
 * accepted and what each one does.
 */
export const Mode = {
  KEY: 'KEY',
  EQUALS: 'EQUALS',
  VALUE: 'VALUE',
  COMMENT: 'COMMENT',
  DECLARE_CONSTANT: 'DECLARE_CONSTANT',
  RETRIEVE_CONSTANT: 'RETRIEVE_CONSTANT',
  // Array elements
  ELEMENT: 'ELEMENT',
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];

const NAME_TOKENS = [TokenKind.WORD, TokenKind.NUMBER, TokenKind.STRING] as const;
const SPACING = [TokenKind.SEPARATOR, TokenKind.NEWLINE] as const;

/**
 * Token kinds accepted in each mode. Anything else is an unexpected token.
 */
export const EXPECTED_TOKENS: Readonly<Record<Mode, ReadonlySet<TokenKind>>> = {
  [Mode.KEY]: new Set<TokenKind>([
    ...NAME_TOKENS,
    ...SPACING,
    TokenKind.HASH,
    TokenKind.AT,
    TokenKind.RBRACE,
    TokenKind.END,
  ]),
  [Mode.EQUALS]: new Set<TokenKind>([...SPACING, TokenKind.EQUALS, TokenKind.HASH]),
  [Mode.VALUE]: new Set<TokenKind>([
    ...NAME_TOKENS,
    ...SPACING,
    TokenKind.HASH,
    TokenKind.AT,
    TokenKind.LBRACKET,
    TokenKind.LBRACE,
  ]),
  [Mode.COMMENT]: new Set<TokenKind>([TokenKind.NEWLINE, TokenKind.END]),
  [Mode.DECLARE_CONSTANT]: new Set<TokenKind>(NAME_TOKENS),
  [Mode.RETRIEVE_CONSTANT]: new Set<TokenKind>(NAME_TOKENS),
  [Mode.ELEMENT]: new Set<TokenKind>([
    ...NAME_TOKENS,
    ...SPACING,
    TokenKind.HASH,
    TokenKind.AT,
    TokenKind.LBRACKET,
    TokenKind.LBRACE,
    TokenKind.RBRACKET,
  ]),
};

export function accepts(mode: Mode, kind: TokenKind): boolean {
  return EXPECTED_TOKENS[mode].has(kind);
}
