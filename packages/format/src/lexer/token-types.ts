/**
 * Token kinds for the knit lexer
 */

export const TokenKind = {
  // Scalars
  WORD: 'WORD', // name, hello, true
  NUMBER: 'NUMBER', // 42, -3.5
  STRING: 'STRING', // "quoted text"

  // Punctuation
  EQUALS: 'EQUALS', // =
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  HASH: 'HASH', // #
  AT: 'AT', // @

  // Whitespace
  SEPARATOR: 'SEPARATOR', // commas, spaces, tabs
  NEWLINE: 'NEWLINE', // \n, \r\n

  // End of input
  END: 'END',
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];
