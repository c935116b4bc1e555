import type { Node, Program } from "./ast.js";

const INDENT = "  ";

function pad(depth: number): string {
  return INDENT.repeat(depth);
}

/**
 * Shortest round-trip digits; integral values print in full (`1`, not `1.0`,
 * and `1e+23` as `100000000000000000000000`).
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  const text = String(value);
  const exponent = text.match(/^(-?)(\d+)(?:\.(\d+))?e\+(\d+)$/);
  if (!exponent) return text;

  const [, sign, whole, fraction = "", power] = exponent;
  const digits = whole + fraction;
  return sign + digits.padEnd(whole.length + Number(power), "0");
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}

type PrintItem = { node: Node; depth: number } | { line: string };

/**
 * Lines of the indented dump for `node`, two spaces per depth level. Walks
 * with an explicit stack so long operator chains print at any length.
 */
export function printNode(node: Node, depth = 0): string[] {
  const lines: string[] = [];
  const stack: PrintItem[] = [{ node, depth }];

  // Children are pushed in reverse so they pop in source order.
  const push = (items: PrintItem[]) => {
    for (let i = items.length - 1; i >= 0; i--) stack.push(items[i]);
  };
  const child = (n: Node, d: number): PrintItem => ({ node: n, depth: d });

  for (let item = stack.pop(); item; item = stack.pop()) {
    if ("line" in item) {
      lines.push(item.line);
      continue;
    }

    const { node: current, depth: level } = item;
    const at = pad(level);
    switch (current.kind) {
      case "Var":
        lines.push(`${at}Var ${current.name}`);
        push([child(current.value, level + 1)]);
        break;
      case "Number":
        lines.push(`${at}Number ${formatNumber(current.value)}`);
        break;
      case "Str":
        lines.push(`${at}String "${current.value}"`);
        break;
      case "Identifier":
        lines.push(`${at}Identifier ${current.name}`);
        break;
      case "Binary":
        lines.push(`${at}Binary '${current.op}'`);
        push([child(current.left, level + 1), child(current.right, level + 1)]);
        break;
      case "Call":
        lines.push(`${at}Call ${current.callee}`);
        push(current.args.map((arg) => child(arg, level + 1)));
        break;
      case "Function":
        lines.push(`${at}Function ${current.name}`);
        push([
          { line: `${pad(level + 1)}Parameters: ${current.params.join(", ")}` },
          { line: `${pad(level + 1)}Body:` },
          ...current.body.map((stmt) => child(stmt, level + 2)),
        ]);
        break;
      case "Return":
        lines.push(`${at}Return`);
        if (current.value) push([child(current.value, level + 1)]);
        break;
      default:
        assertNever(current);
    }
  }

  return lines;
}

export function formatProgram(program: Program): string {
  const lines: string[] = [];
  for (const node of program) {
    for (const line of printNode(node)) lines.push(line);
  }
  return lines.join("\n");
}
