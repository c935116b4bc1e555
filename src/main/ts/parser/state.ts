import {
  type FrontendError,
  type ParseErrorCode,
  parseError,
} from "../common/errors.js";
import type { Location, Span } from "../common/span.js";
import { type Token, TokenKind, tokenKindName } from "../lexer/token.js";

export const DEFAULT_MAX_DEPTH = 256;

export interface ParseOptions {
  sourceFile?: string;
  /** Deepest statement/primary nesting accepted before failing. */
  maxDepth?: number;
}

export function describeToken(token: Token | undefined): string {
  if (!token) return "end of input";
  if (token.kind === TokenKind.Newline) return "newline";
  return `${tokenKindName(token.kind)} '${token.value}'`;
}

/**
 * Forward-only cursor over the token list. Lookahead is limited to the
 * current token and the one after it.
 */
export class ParserState {
  readonly tokens: readonly Token[];
  readonly sourceFile: string;
  readonly maxDepth: number;
  current = 0;
  private depth = 0;

  constructor(tokens: readonly Token[], options: ParseOptions = {}) {
    this.tokens = tokens;
    this.sourceFile = options.sourceFile ?? "<input>";
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  peek(offset: 0 | 1 = 0): Token | undefined {
    return this.tokens[this.current + offset];
  }

  isAtEnd(): boolean {
    return this.current >= this.tokens.length;
  }

  check(kind: TokenKind, value?: string, offset: 0 | 1 = 0): boolean {
    const token = this.peek(offset);
    if (!token || token.kind !== kind) return false;
    return value === undefined || token.value === value;
  }

  advance(): Token {
    const token = this.peek();
    if (!token) throw this.endOfInput("Unexpected end of input");
    this.current++;
    return token;
  }

  match(kind: TokenKind, value?: string): Token | undefined {
    return this.check(kind, value) ? this.advance() : undefined;
  }

  expect(kind: TokenKind, value?: string): Token {
    const token = this.match(kind, value);
    if (token) return token;

    const wanted =
      value === undefined
        ? tokenKindName(kind)
        : `${tokenKindName(kind)} '${value}'`;
    const found = this.peek();
    const message = `Expected ${wanted}, but found ${describeToken(found)}`;
    if (!found) throw this.endOfInput(message);
    throw this.error("unexpected-token", message, found);
  }

  skipNewlines() {
    while (this.check(TokenKind.Newline)) this.current++;
  }

  skipComments() {
    while (this.check(TokenKind.Comment)) this.current++;
  }

  /** Runs `fn` one nesting level deeper, failing past `maxDepth`. */
  nested<T>(fn: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw this.error(
        "nesting-too-deep",
        `Nesting exceeds the maximum depth of ${this.maxDepth}`,
        this.peek()
      );
    }
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  error(
    code: ParseErrorCode,
    message: string,
    token: Token | undefined
  ): FrontendError {
    return parseError(
      code,
      message,
      token ? this.tokenSpan(token) : this.endSpan()
    );
  }

  endOfInput(message: string): FrontendError {
    return parseError("unexpected-end-of-input", message, this.endSpan());
  }

  tokenSpan(token: Token): Span {
    return {
      start: { line: token.line, column: token.column, offset: token.offset },
      end: token.end,
      sourceFile: this.sourceFile,
    };
  }

  span(start: Token, end: Token): Span {
    return {
      start: { line: start.line, column: start.column, offset: start.offset },
      end: end.end,
      sourceFile: this.sourceFile,
    };
  }

  /** Span of the most recently consumed token. */
  previousSpan(): Span {
    const prev = this.tokens[this.current - 1];
    return prev ? this.tokenSpan(prev) : this.endSpan();
  }


  private endSpan(): Span {
    const last = this.tokens[this.tokens.length - 1];
    const at: Location = last
      ? last.end
      : { line: 1, column: 1, offset: 0 };
    return { start: at, end: at, sourceFile: this.sourceFile };
  }
}
