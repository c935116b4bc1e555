import type { Span } from "../common/span.js";

export interface BaseNode {
  readonly span: Span;
}

/**
 * Every node the parser can produce. Child slots take any `Node` because a
 * line break at an operand position is parsed as a fresh statement.
 */
export type Node =
  | VarDecl
  | NumberLiteral
  | StringLiteral
  | IdentifierExpr
  | BinaryExpr
  | CallExpr
  | FnDecl
  | ReturnStmt;

export type NodeKind = Node["kind"];

export type Program = readonly Node[];

// --- Statements ---

/**
 * Example: `var x = 1 + 2`
 */
export interface VarDecl extends BaseNode {
  readonly kind: "Var";
  readonly name: string;
  readonly value: Node;
}

/**
 * Example: `fn add(a, b) { return a + b }`
 */
export interface FnDecl extends BaseNode {
  readonly kind: "Function";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly Node[];
}

/**
 * Example: `return a + b`
 */
export interface ReturnStmt extends BaseNode {
  readonly kind: "Return";
  readonly value?: Node;
}

// --- Expressions ---

/**
 * Example: `42`. Only digit runs reach the parser.
 */
export interface NumberLiteral extends BaseNode {
  readonly kind: "Number";
  readonly value: number;
}

/**
 * Example: `"hello"`, kept exactly as written between the quotes.
 */
export interface StringLiteral extends BaseNode {
  readonly kind: "Str";
  readonly value: string;
}

export interface IdentifierExpr extends BaseNode {
  readonly kind: "Identifier";
  readonly name: string;
}

/**
 * Example: `a * b`
 */
export interface BinaryExpr extends BaseNode {
  readonly kind: "Binary";
  readonly op: string;
  readonly left: Node;
  readonly right: Node;
}

/**
 * Example: `print(a, 1)`
 */
export interface CallExpr extends BaseNode {
  readonly kind: "Call";
  readonly callee: string;
  readonly args: readonly Node[];
}
