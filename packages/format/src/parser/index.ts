export { accepts, EXPECTED_TOKENS, Mode } from './modes.js';
export { DEFAULT_LIMITS, MAX_NESTING_DEPTH, Parser, unquote } from './parser.js';
export type { ParseLimits, ParseOptions } from './parser.js';
