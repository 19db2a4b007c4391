import type { Logger } from '@knit/logger';
import {
  LimitExceededError,
  TruncatedInputError,
  UndefinedConstantError,
  UnexpectedTokenError,
} from '../errors.js';
import { Lexer } from '../lexer/lexer.js';
import type { SourcePosition, Token } from '../lexer/token.js';
import { TokenKind } from '../lexer/token-types.js';
import { ConstantTable } from '../value/constants.js';
import type { Document, Value, ValueMap } from '../value/value.js';
import { accepts, EXPECTED_TOKENS, Mode } from './modes.js';

/**
 * Resource limits for a single parse
 */
export interface ParseLimits {
  /** Maximum nesting depth of maps and arrays */
  maxDepth: number;
  /** Maximum document length in characters */
  maxInputLength: number;
}

export const DEFAULT_LIMITS: Readonly<ParseLimits> = {
  maxDepth: 256,
  maxInputLength: 10_000_000,
};

/**
 * Hard ceiling on `maxDepth`. Maps and arrays are parsed recursively, so a
 * larger requested depth is clamped to this one.
 */
export const MAX_NESTING_DEPTH = 1024;

export interface ParseOptions {
  /** Receives debug events while parsing */
  logger?: Logger;
  /** Override default limits; `maxDepth` is clamped to MAX_NESTING_DEPTH */
  limits?: Partial<ParseLimits>;
}

/**
 * Where the value currently being parsed will be stored
 */
type Target = { kind: 'entry'; key: string } | { kind: 'constant'; name: string };

/**
 * Strip the surrounding quotes of a STRING token and resolve `\"` and `\\`.
 * Any other backslash is kept as written.
 */
export function unquote(content: string): string {
  return content.slice(1, -1).replace(/\\(["\\])/g, '$1');
}

function scalarValue(token: Token): Value {
  switch (token.kind) {
    case TokenKind.NUMBER:
      return Number(token.content);
    case TokenKind.STRING:
      return unquote(token.content);
    default:
      switch (token.content) {
        case 'null':
          return null;
        case 'true':
          return true;
        case 'false':
          return false;
        default:
          return token.content;
      }
  }
}

function nameOf(token: Token): string {
  return token.kind === TokenKind.STRING ? unquote(token.content) : token.content;
}

function isScalar(kind: TokenKind): boolean {
  return kind === TokenKind.WORD || kind === TokenKind.NUMBER || kind === TokenKind.STRING;
}

function top(modes: Mode[]): Mode {
  return modes[modes.length - 1];
}

function replaceTop(modes: Mode[], mode: Mode): void {
  modes[modes.length - 1] = mode;
}

/**
 * Mode-stack parser for the knit format
 *
 * Each map or array is parsed by its own loop with its own mode stack; nested
 * maps and arrays recurse on the same lexer. One constant table is shared by
 * every level of a document. A parser instance handles exactly one document.
 */
export class Parser {
  private readonly source: string;
  private readonly lexer: Lexer;
  private readonly constants = new ConstantTable();
  private readonly limits: ParseLimits;
  private readonly logger: Logger | null;

  constructor(source: string, options: ParseOptions = {}) {
    this.source = source;
    this.lexer = new Lexer(source);
    const limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.limits = { ...limits, maxDepth: Math.min(limits.maxDepth, MAX_NESTING_DEPTH) };
    this.logger = options.logger ?? null;
  }

  parse(): Document {
    if (this.source.length > this.limits.maxInputLength) {
      throw new LimitExceededError(
        `Document exceeds maximum length of ${this.limits.maxInputLength} characters`,
        this.source,
        { line: 1, column: 0, offset: 0 },
        'maxInputLength',
      );
    }

    const document = this.parseMap(0, null);

    this.logger?.debug('document_parsed', {
      entries: document.size,
      constants: this.constants.size,
    });
    return document;
  }

  /**
   * Parse map entries until the closing brace of a nested map, or until the
   * end of input for the top-level document (`open` is null).
   */
  private parseMap(depth: number, open: Token | null): ValueMap {
    this.checkDepth(depth, open);

    const result: ValueMap = new Map();
    const modes: Mode[] = [Mode.KEY];
    const targets: Target[] = [];

    for (;;) {
      const token = this.lexer.next();

      if (token.kind === TokenKind.END) {
        if (open === null && this.betweenEntries(modes)) {
          return result;
        }
        throw this.truncated(modes, token);
      }

      const mode = top(modes);
      this.expect(mode, token);

      switch (mode) {
        case Mode.KEY:
          switch (token.kind) {
            case TokenKind.HASH:
              this.beginComment(modes);
              break;
            case TokenKind.AT:
              modes.push(Mode.DECLARE_CONSTANT);
              break;
            case TokenKind.WORD:
            case TokenKind.NUMBER:
            case TokenKind.STRING:
              targets.push({ kind: 'entry', key: nameOf(token) });
              modes.push(Mode.EQUALS);
              break;
            case TokenKind.RBRACE:
              if (open === null) {
                throw this.unexpected(mode, token);
              }
              return result;
          }
          break;

        case Mode.DECLARE_CONSTANT:
          targets.push({ kind: 'constant', name: nameOf(token) });
          replaceTop(modes, Mode.EQUALS);
          break;

        case Mode.EQUALS:
          if (token.kind === TokenKind.EQUALS) {
            replaceTop(modes, Mode.VALUE);
          } else if (token.kind === TokenKind.HASH) {
            this.beginComment(modes);
          }
          break;

        case Mode.VALUE:
          if (token.kind === TokenKind.HASH) {
            this.beginComment(modes);
          } else if (token.kind === TokenKind.AT) {
            replaceTop(modes, Mode.RETRIEVE_CONSTANT);
          } else if (isScalar(token.kind)) {
            this.store(targets, result, scalarValue(token), token.position);
            modes.pop();
          } else if (token.kind === TokenKind.LBRACKET) {
            const array = this.parseArray(depth + 1, token);
            this.store(targets, result, array, token.position);
            modes.pop();
          } else if (token.kind === TokenKind.LBRACE) {
            const map = this.parseMap(depth + 1, token);
            this.store(targets, result, map, token.position);
            modes.pop();
          }
          break;

        case Mode.RETRIEVE_CONSTANT:
          this.store(targets, result, this.retrieve(token), token.position);
          modes.pop();
          break;

        case Mode.COMMENT:
          modes.pop();
          break;
      }
    }
  }

  /**
   * Parse array elements up to the closing bracket
   */
  private parseArray(depth: number, open: Token): Value[] {
    this.checkDepth(depth, open);

    const items: Value[] = [];
    const modes: Mode[] = [Mode.ELEMENT];

    for (;;) {
      const token = this.lexer.next();

      if (token.kind === TokenKind.END) {
        throw this.truncated(modes, token);
      }

      const mode = top(modes);
      this.expect(mode, token);

      switch (mode) {
        case Mode.ELEMENT:
          if (token.kind === TokenKind.RBRACKET) {
            return items;
          } else if (token.kind === TokenKind.HASH) {
            this.beginComment(modes);
          } else if (token.kind === TokenKind.AT) {
            modes.push(Mode.RETRIEVE_CONSTANT);
          } else if (isScalar(token.kind)) {
            items.push(scalarValue(token));
          } else if (token.kind === TokenKind.LBRACKET) {
            items.push(this.parseArray(depth + 1, token));
          } else if (token.kind === TokenKind.LBRACE) {
            items.push(this.parseMap(depth + 1, token));
          }
          break;

        case Mode.RETRIEVE_CONSTANT:
          items.push(this.retrieve(token));
          modes.pop();
          break;

        case Mode.COMMENT:
          modes.pop();
          break;
      }
    }
  }

  private store(targets: Target[], result: ValueMap, value: Value, position: SourcePosition): void {
    const target = targets.pop();
    if (target === undefined) {
      throw new Error('No pending key or constant to receive a value');
    }

    if (target.kind === 'constant') {
      this.constants.set(target.name, value);
      this.logger?.debug('constant_declared', {
        name: target.name,
        line: position.line,
      });
    } else {
      result.set(target.key, value);
    }
  }

  private retrieve(token: Token): Value {
    const name = nameOf(token);
    const value = this.constants.get(name);
    if (value === undefined) {
      throw new UndefinedConstantError(this.source, token.position, name);
    }
    return value;
  }

  private beginComment(modes: Mode[]): void {
    modes.push(Mode.COMMENT);
    this.lexer.skipLine();
  }

  /**
   * True when only KEY is open, possibly under a trailing comment
   */
  private betweenEntries(modes: Mode[]): boolean {
    return modes.every((mode, index) => (index === 0 ? mode === Mode.KEY : mode === Mode.COMMENT));
  }

  /**
   * Report the innermost unresolved mode, ignoring an open comment
   */
  private truncated(modes: Mode[], token: Token): TruncatedInputError {
    const open = modes.filter((mode) => mode !== Mode.COMMENT);
    const mode = open.length > 0 ? top(open) : Mode.KEY;
    return new TruncatedInputError(this.source, token.position, mode);
  }

  private checkDepth(depth: number, open: Token | null): void {
    if (depth > this.limits.maxDepth && open !== null) {
      throw new LimitExceededError(
        `Nesting exceeds maximum depth of ${this.limits.maxDepth}`,
        this.source,
        open.position,
        'maxDepth',
      );
    }
  }

  private expect(mode: Mode, token: Token): void {
    if (!accepts(mode, token.kind)) {
      throw this.unexpected(mode, token);
    }
  }

  private unexpected(mode: Mode, token: Token): UnexpectedTokenError {
    return new UnexpectedTokenError(
      this.source,
      token.position,
      token.kind,
      mode,
      EXPECTED_TOKENS[mode],
    );
  }
}
