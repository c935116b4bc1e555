import * as path from "node:path";
import { formatProgram } from "../ast/printer.js";
import { DiagnosticReporter } from "../common/diagnostics.js";
import { formatDiagnostic } from "../common/pretty.js";
import { compileSource } from "../compiler/frontend.js";
import { formatTokens } from "../tools/dump.js";
import { USAGE, parseCliArgs } from "./args.js";

export interface CliIO {
  fileExists(filePath: string): boolean;
  readFile(filePath: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
}

/** Runs the driver and returns the process exit code. */
export function runCli(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  io: CliIO
): number {
  const options = parseCliArgs(argv, env);

  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }

  if (options.file === undefined) {
    io.stderr(USAGE);
    return 1;
  }

  const absolutePath = path.resolve(options.file);
  if (!io.fileExists(absolutePath)) {
    io.stderr(`Error: File not found: ${absolutePath}`);
    return 1;
  }

  const source = io.readFile(absolutePath);
  const reporter = new DiagnosticReporter({
    sink: (diagnostic) =>
      io.stderr(
        formatDiagnostic(diagnostic, source, {
          contextLines: options.contextLines,
        })
      ),
  });
  const result = compileSource(source, absolutePath, reporter, {
    maxDepth: options.maxDepth,
  });
  if (!result.ok) return 1;

  const { tokens, program } = result.value;
  if (options.showTokens && tokens.length > 0) io.stdout(formatTokens(tokens));
  if (options.showAst && program.length > 0) io.stdout(formatProgram(program));
  return 0;
}
