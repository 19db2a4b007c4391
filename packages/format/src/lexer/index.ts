export { Lexer, matchToken } from './lexer.js';
export type { TokenMatch } from './lexer.js';
export { TokenKind } from './token-types.js';
export type { SourcePosition, Token } from './token.js';
