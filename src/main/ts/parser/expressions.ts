import type { BinaryExpr, CallExpr, Node } from "../ast/ast.js";
import { joinSpans } from "../common/span.js";
import { TokenKind } from "../lexer/token.js";
import { type ParserState, describeToken } from "./state.js";

// Lowest level first. Every level is left-associative.
const PRECEDENCE_LEVELS: readonly (readonly string[])[] = [
  ["+", "-"],
  ["*", "/"],
];

export class ExpressionParser {
  constructor(
    private readonly state: ParserState,
    private readonly parseStatement: () => Node
  ) {}

  parseExpression(): Node {
    return this.binary(0);
  }

  private binary(level: number): Node {
    if (level >= PRECEDENCE_LEVELS.length) return this.primary();

    const operators = PRECEDENCE_LEVELS[level];
    let left = this.binary(level + 1);

    while (this.checkOperator(operators)) {
      const op = this.state.advance().value;
      const right = this.binary(level + 1);
      const node: BinaryExpr = {
        kind: "Binary",
        op,
        left,
        right,
        span: joinSpans(left.span, right.span),
      };
      left = node;
    }

    return left;
  }

  private checkOperator(operators: readonly string[]): boolean {
    const token = this.state.peek();
    return (
      token?.kind === TokenKind.Operator && operators.includes(token.value)
    );
  }

  private primary(): Node {
    return this.state.nested((): Node => {
      this.state.skipComments();

      const token = this.state.peek();
      if (!token) {
        throw this.state.endOfInput(
          "Unexpected end of input while parsing primary expression"
        );
      }

      switch (token.kind) {
        case TokenKind.Newline:
          // A line break where an operand belongs starts a new statement,
          // which then stands in as the operand.
          this.state.skipNewlines();
          return this.parseStatement();
        case TokenKind.Number:
          this.state.advance();
          return {
            kind: "Number",
            value: Number(token.value),
            span: this.state.tokenSpan(token),
          };
        case TokenKind.String:
          this.state.advance();
          return {
            kind: "Str",
            value: token.value,
            span: this.state.tokenSpan(token),
          };
        case TokenKind.Identifier:
          if (this.state.check(TokenKind.Delimiter, "(", 1)) return this.call();
          this.state.advance();
          return {
            kind: "Identifier",
            name: token.value,
            span: this.state.tokenSpan(token),
          };
        case TokenKind.Delimiter:
          if (token.value === "(") return this.grouping();
          break;
        default:
          break;
      }

      throw this.state.error(
        "unexpected-token",
        `Unexpected ${describeToken(token)} while parsing primary expression`,
        token
      );
    });
  }

  private grouping(): Node {
    this.state.expect(TokenKind.Delimiter, "(");
    const expr = this.parseExpression();
    this.state.expect(TokenKind.Delimiter, ")");
    return expr;
  }

  private call(): CallExpr {
    const name = this.state.expect(TokenKind.Identifier);
    this.state.expect(TokenKind.Delimiter, "(");

    const args: Node[] = [];
    if (!this.state.match(TokenKind.Delimiter, ")")) {
      do {
        args.push(this.parseExpression());
      } while (this.state.match(TokenKind.Delimiter, ","));
      this.state.expect(TokenKind.Delimiter, ")");
    }

    return {
      kind: "Call",
      callee: name.value,
      args,
      span: joinSpans(this.state.tokenSpan(name), this.state.previousSpan()),
    };
  }
}
