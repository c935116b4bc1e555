import { DEFAULT_MAX_DEPTH } from "../parser/state.js";

export const MAX_DEPTH_ENV = "NANO_MAX_DEPTH";

export interface CliOptions {
  file?: string;
  showTokens: boolean;
  showAst: boolean;
  maxDepth: number;
  contextLines: number;
  help: boolean;
}

export const USAGE = [
  "Usage: nano [options] <file>",
  "",
  "Options:",
  "  --tokens           print the token dump",
  "  --ast              print the AST dump",
  "  --max-depth <n>    nesting limit for the parser (env NANO_MAX_DEPTH)",
  "  --context <n>      source lines shown around an error",
  "  -h, --help         show this message",
].join("\n");

function positive(v: string | undefined): number | undefined {
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

function nonNegative(v: string | undefined): number | undefined {
  const n = Number(v);
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

/**
 * Reads driver options from `argv` (without the node and script entries).
 * With neither `--tokens` nor `--ast`, both dumps are printed.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): CliOptions {
  let file: string | undefined;
  let showTokens = false;
  let showAst = false;
  let help = false;
  let maxDepth: number | undefined;
  let contextLines: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    if (a === "-h" || a === "--help") {
      help = true;
      continue;
    }
    if (a === "--tokens") {
      showTokens = true;
      continue;
    }
    if (a === "--ast") {
      showAst = true;
      continue;
    }

    if (a === "--max-depth") {
      maxDepth = positive(argv[i + 1]) ?? maxDepth;
      i++;
      continue;
    }
    if (a.startsWith("--max-depth=")) {
      maxDepth = positive(a.slice("--max-depth=".length)) ?? maxDepth;
      continue;
    }

    if (a === "--context") {
      contextLines = nonNegative(argv[i + 1]) ?? contextLines;
      i++;
      continue;
    }
    if (a.startsWith("--context=")) {
      contextLines = nonNegative(a.slice("--context=".length)) ?? contextLines;
      continue;
    }

    if (file === undefined && !a.startsWith("-")) file = a;
  }

  if (!showTokens && !showAst) {
    showTokens = true;
    showAst = true;
  }

  return {
    file,
    showTokens,
    showAst,
    maxDepth: maxDepth ?? positive(env[MAX_DEPTH_ENV]) ?? DEFAULT_MAX_DEPTH,
    contextLines: contextLines ?? 0,
    help,
  };
}
