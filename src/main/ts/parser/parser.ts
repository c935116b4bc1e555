import type { FnDecl, Node, Program, ReturnStmt, VarDecl } from "../ast/ast.js";
import { FrontendError } from "../common/errors.js";
import { type Result, err, ok } from "../common/result.js";
import { joinSpans } from "../common/span.js";
import { type Token, TokenKind } from "../lexer/token.js";
import { ExpressionParser } from "./expressions.js";
import { type ParseOptions, ParserState } from "./state.js";

export class Parser {
  private readonly state: ParserState;
  private readonly expressionParser: ExpressionParser;

  constructor(tokens: readonly Token[], options: ParseOptions = {}) {
    this.state = new ParserState(tokens, options);
    this.expressionParser = new ExpressionParser(this.state, () =>
      this.statement()
    );
  }

  /** Throws a `FrontendError` at the first grammar violation. */
  parse(): Program {
    const statements: Node[] = [];

    while (!this.state.isAtEnd()) {
      this.state.skipNewlines();
      if (!this.state.isAtEnd()) statements.push(this.statement());
    }

    return statements;
  }

  private statement(): Node {
    return this.state.nested((): Node => {
      this.state.skipNewlines();

      const token = this.state.peek();
      if (!token) {
        throw this.state.endOfInput(
          "Expected a statement, but found end of input"
        );
      }

      if (token.kind === TokenKind.Comment) {
        throw this.state.error(
          "comment-at-statement",
          "Expected a statement, but found comment",
          token
        );
      }

      if (token.kind !== TokenKind.Keyword) return this.expression();

      switch (token.value) {
        case "var":
          this.state.advance();
          return this.varDeclaration(token);
        case "fn":
          this.state.advance();
          return this.fnDeclaration(token);
        case "return":
          this.state.advance();
          return this.returnStatement(token);
        default:
          throw this.state.error(
            "unknown-keyword",
            `Unknown keyword '${token.value}' at the start of a statement`,
            token
          );
      }
    });
  }

  private varDeclaration(start: Token): VarDecl {
    const name = this.state.expect(TokenKind.Identifier).value;
    this.state.expect(TokenKind.Operator, "=");
    const value = this.expression();

    return {
      kind: "Var",
      name,
      value,
      span: joinSpans(this.state.tokenSpan(start), value.span),
    };
  }

  private fnDeclaration(start: Token): FnDecl {
    const name = this.state.expect(TokenKind.Identifier).value;
    this.state.expect(TokenKind.Delimiter, "(");

    const params: string[] = [];
    if (!this.state.match(TokenKind.Delimiter, ")")) {
      do {
        params.push(this.state.expect(TokenKind.Identifier).value);
      } while (this.state.match(TokenKind.Delimiter, ","));
      this.state.expect(TokenKind.Delimiter, ")");
    }

    this.state.skipNewlines();
    this.state.expect(TokenKind.Delimiter, "{");

    const body: Node[] = [];
    for (;;) {
      this.state.skipNewlines();
      if (this.state.isAtEnd()) {
        throw this.state.error(
          "unclosed-function-body",
          `Expected '}' to close the body of '${name}', but found end of input`,
          undefined
        );
      }
      if (this.state.match(TokenKind.Delimiter, "}")) break;
      body.push(this.statement());
    }

    return {
      kind: "Function",
      name,
      params,
      body,
      span: joinSpans(this.state.tokenSpan(start), this.state.previousSpan()),
    };
  }

  private returnStatement(start: Token): ReturnStmt {
    this.state.skipNewlines();
    const value = this.expression();

    return {
      kind: "Return",
      value,
      span: joinSpans(this.state.tokenSpan(start), value.span),
    };
  }

  private expression(): Node {
    return this.expressionParser.parseExpression();
  }
}

/**
 * Parses a token list into its top-level statements. Either the whole
 * program is returned or the first parse error is.
 */
export function parse(
  tokens: readonly Token[],
  options: ParseOptions = {}
): Result<Program, FrontendError> {
  try {
    return ok(new Parser(tokens, options).parse());
  } catch (e) {
    if (e instanceof FrontendError) return err(e);
    throw e;
  }
}
