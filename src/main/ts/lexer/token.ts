import type { Location } from "../common/span.js";

export enum TokenKind {
  Identifier,
  Keyword,
  Number,
  String,
  Operator,
  Delimiter,
  Comment,
  Newline,
}

export interface Token {
  readonly kind: TokenKind;
  /** The lexeme. Strings drop their quotes, comments their markers. */
  readonly value: string;
  readonly line: number;
  readonly column: number;
  /** Code point index of the first character. */
  readonly offset: number;
  /** Source code points consumed, quotes and markers included. */
  readonly length: number;
  /** Position just past the last character; a newline ends on the next line. */
  readonly end: Location;
}

export const NEWLINE_LEXEME = "[newline]";

export const KEYWORDS: ReadonlySet<string> = new Set([
  "if",
  "else",
  "elseif",
  "var",
  "const",
  "fn",
  "return",
  "for",
  "in",
  "while",
  "once",
  "true",
  "false",
]);

export const OPERATORS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "=",
  "+=",
  "-=",
  "*=",
  "/=",
  "==",
]);

export const DELIMITERS: ReadonlySet<string> = new Set([
  "(",
  ")",
  "{",
  "}",
  ".",
  ",",
  ";",
]);

/** Lowercase noun used for a kind in dumps and diagnostics. */
export function tokenKindName(kind: TokenKind): string {
  return TokenKind[kind].toLowerCase();
}
