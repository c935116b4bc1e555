export * from "./ast/ast.js";
export { formatNumber, formatProgram, printNode } from "./ast/printer.js";
export * from "./common/diagnostics.js";
export * from "./common/errors.js";
export { formatDiagnostic } from "./common/pretty.js";
export type { FormatDiagnosticOptions } from "./common/pretty.js";
export * from "./common/result.js";
export type { Location, Span } from "./common/span.js";
export { compileSource } from "./compiler/frontend.js";
export type { FrontendOptions, FrontendOutput } from "./compiler/frontend.js";
export { Lexer, tokenize } from "./lexer/lexer.js";
export * from "./lexer/token.js";
export { Parser, parse } from "./parser/parser.js";
export { DEFAULT_MAX_DEPTH } from "./parser/state.js";
export type { ParseOptions } from "./parser/state.js";
export { formatTokens } from "./tools/dump.js";
