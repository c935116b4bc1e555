import { type Token, tokenKindName } from "../lexer/token.js";

/** One `<value> : <kind>` line per token. */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens
    .map((token) => `${token.value} : ${tokenKindName(token.kind)}`)
    .join("\n");
}
