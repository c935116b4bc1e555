import { type Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
import type { Span } from "./span.js";

export type FrontendErrorKind = "LexError" | "ParseError";

export type LexErrorCode = "unknown-character" | "unterminated-string";

export type ParseErrorCode =
  | "unexpected-token"
  | "unexpected-end-of-input"
  | "unclosed-function-body"
  | "unknown-keyword"
  | "comment-at-statement"
  | "nesting-too-deep";

export type FrontendErrorCode = LexErrorCode | ParseErrorCode;

/**
 * The single terminal error of a tokenize/parse run. Thrown at the point of
 * detection and turned into an `Err` at the public call boundary.
 */
export class FrontendError extends Error {
  constructor(
    readonly kind: FrontendErrorKind,
    readonly code: FrontendErrorCode,
    message: string,
    readonly span: Span
  ) {
    super(message);
    this.name = kind;
  }

  get line(): number {
    return this.span.start.line;
  }

  get column(): number {
    return this.span.start.column;
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: DiagnosticSeverity.Error,
      message: this.message,
      code: this.code,
      span: this.span,
    };
  }
}

export function lexError(
  code: LexErrorCode,
  message: string,
  span: Span
): FrontendError {
  return new FrontendError("LexError", code, message, span);
}

export function parseError(
  code: ParseErrorCode,
  message: string,
  span: Span
): FrontendError {
  return new FrontendError("ParseError", code, message, span);
}
