import { type Diagnostic, DiagnosticSeverity } from "./diagnostics.js";

export type FormatDiagnosticOptions = {
  contextLines?: number;
};

function sourceLines(src: string): string[] {
  return src.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}^`;
}

function header(diag: Diagnostic): string {
  const severity = DiagnosticSeverity[diag.severity].toLowerCase();
  if (!diag.span) return `${severity}: ${diag.message}`;
  const { start, sourceFile } = diag.span;
  return `${sourceFile}:${start.line}:${start.column} ${severity}: ${diag.message}`;
}

/**
 * Formats a diagnostic as a header line plus a code frame with a caret under
 * the reported column.
 *
 * `source` must be the text of `diag.span.sourceFile`. Columns count code
 * points, so the caret lines up for any text without wide characters.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const h = header(diag);
  if (!diag.span || source === undefined) return h;

  const lines = sourceLines(source);
  const contextLines = Math.max(0, opts.contextLines ?? 0);
  const lineNo = Math.min(Math.max(1, diag.span.start.line), lines.length);
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lines.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;

  const out: string[] = [h];
  for (let ln = startLine; ln <= endLine; ln++) {
    out.push(`${padLeft(String(ln), lineNoWidth)} | ${lines[ln - 1]}`);
    if (ln === lineNo) out.push(caretLine(diag.span.start.column, lineNoWidth));
  }
  return out.join("\n");
}
