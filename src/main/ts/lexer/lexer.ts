import { FrontendError, lexError } from "../common/errors.js";
import { type Result, err, ok } from "../common/result.js";
import type { Location, Span } from "../common/span.js";
import {
  DELIMITERS,
  KEYWORDS,
  NEWLINE_LEXEME,
  OPERATORS,
  type Token,
  TokenKind,
} from "./token.js";

const WHITESPACE = /\p{White_Space}/u;
const ALPHANUMERIC = /[\p{Alphabetic}\p{N}]/u;
const EOF_CHAR = "\0";

export class Lexer {
  // Decoded once so every peek is O(1) and columns count code points.
  private readonly chars: string[];
  private readonly sourceFile: string;
  private tokens: Token[] = [];
  private current = 0;
  private line = 1;
  private column = 1;
  private start: Location = { line: 1, column: 1, offset: 0 };

  constructor(source: string, sourceFile = "<input>") {
    this.chars = Array.from(source);
    this.sourceFile = sourceFile;
  }

  /** Throws a `FrontendError` on the first character it cannot classify. */
  scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.location();
      this.scanToken();
    }
    return this.tokens;
  }

  private scanToken() {
    const c = this.peek();

    if (WHITESPACE.test(c)) {
      this.advance();
      if (c === "\n") this.addToken(TokenKind.Newline, NEWLINE_LEXEME);
    } else if (this.isDigit(c)) {
      this.number();
    } else if (this.isAlphaNumeric(c)) {
      this.identifier();
    } else if (DELIMITERS.has(c)) {
      this.advance();
      this.addToken(TokenKind.Delimiter, c);
    } else if (c === '"') {
      this.string();
    } else if (c === "/") {
      this.slash();
    } else if (OPERATORS.has(c)) {
      this.operator();
    } else {
      throw this.error(`Unknown character '${c}'`);
    }
  }

  private number() {
    while (this.isDigit(this.peek())) this.advance();
    this.addToken(TokenKind.Number, this.lexeme());
  }

  private identifier() {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.lexeme();
    this.addToken(
      KEYWORDS.has(text) ? TokenKind.Keyword : TokenKind.Identifier,
      text
    );
  }

  private string() {
    this.advance();
    while (!this.isAtEnd() && this.peek() !== '"') this.advance();

    if (this.isAtEnd()) {
      throw lexError(
        "unterminated-string",
        "Unterminated string literal",
        this.spanFrom(this.start)
      );
    }

    // The closing ".
    this.advance();
    this.addToken(
      TokenKind.String,
      this.chars.slice(this.start.offset + 1, this.current - 1).join("")
    );
  }

  private slash() {
    const next = this.peekNext();

    if (next === "/") {
      this.advance();
      this.advance();
      while (!this.isAtEnd() && this.peek() !== "\n") this.advance();
      this.addToken(TokenKind.Comment, this.lexeme(2));
    } else if (next === "*") {
      this.advance();
      this.advance();
      // Stops in front of "*/"; the terminator is lexed as two operators.
      while (
        !this.isAtEnd() &&
        !(this.peek() === "*" && this.peekNext() === "/")
      ) {
        this.advance();
      }
      this.addToken(TokenKind.Comment, this.lexeme(2));
    } else {
      this.advance();
      this.addToken(TokenKind.Operator, "/");
    }
  }

  private operator() {
    const pair = this.peek() + this.peekNext();
    if (OPERATORS.has(pair)) {
      this.advance();
      this.advance();
      this.addToken(TokenKind.Operator, pair);
      return;
    }

    const single = this.advance();
    this.addToken(TokenKind.Operator, single);
  }

  private peek(): string {
    return this.chars[this.current] ?? EOF_CHAR;
  }

  private peekNext(): string {
    return this.chars[this.current + 1] ?? EOF_CHAR;
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAlphaNumeric(c: string): boolean {
    return c !== EOF_CHAR && ALPHANUMERIC.test(c);
  }

  private isAtEnd(): boolean {
    return this.current >= this.chars.length;
  }

  private advance(): string {
    const c = this.chars[this.current++] ?? EOF_CHAR;
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private lexeme(skip = 0): string {
    return this.chars.slice(this.start.offset + skip, this.current).join("");
  }

  private location(): Location {
    return { line: this.line, column: this.column, offset: this.current };
  }

  private spanFrom(start: Location): Span {
    return { start, end: this.location(), sourceFile: this.sourceFile };
  }

  private addToken(kind: TokenKind, value: string) {
    this.tokens.push({
      kind,
      value,
      line: this.start.line,
      column: this.start.column,
      offset: this.start.offset,
      length: this.current - this.start.offset,
      end: this.location(),
    });
  }

  private error(message: string): FrontendError {
    const here = this.location();
    return lexError("unknown-character", message, {
      start: here,
      end: { ...here, column: here.column + 1, offset: here.offset + 1 },
      sourceFile: this.sourceFile,
    });
  }
}

/**
 * Tokenizes `source` in one pass. Either every token is returned or the
 * first lexical error is; never a partial sequence.
 */
export function tokenize(
  source: string,
  sourceFile?: string
): Result<Token[], FrontendError> {
  try {
    return ok(new Lexer(source, sourceFile).scanTokens());
  } catch (e) {
    if (e instanceof FrontendError) return err(e);
    throw e;
  }
}
