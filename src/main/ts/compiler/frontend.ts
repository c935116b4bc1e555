import type { Program } from "../ast/ast.js";
import type { DiagnosticReporter } from "../common/diagnostics.js";
import type { FrontendError } from "../common/errors.js";
import { type Result, andThen, map } from "../common/result.js";
import { tokenize } from "../lexer/lexer.js";
import type { Token } from "../lexer/token.js";
import { parse } from "../parser/parser.js";

export interface FrontendOptions {
  maxDepth?: number;
}

export interface FrontendOutput {
  tokens: Token[];
  program: Program;
}

/**
 * Tokenizes then parses `source`. The first error stops the run, is reported
 * to `reporter` and comes back as the `Err` value.
 */
export function compileSource(
  source: string,
  sourceFile: string,
  reporter: DiagnosticReporter,
  options: FrontendOptions = {}
): Result<FrontendOutput, FrontendError> {
  const result = andThen(tokenize(source, sourceFile), (tokens) =>
    map(
      parse(tokens, { sourceFile, maxDepth: options.maxDepth }),
      (program) => ({ tokens, program })
    )
  );

  if (!result.ok) reporter.report(result.error.toDiagnostic());
  return result;
}
