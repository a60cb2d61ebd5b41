import type { Token, TokenIndex, TokenKind } from "../types.js";

/** First token of `kind` at or after `start`. */
export function findNextToken(
	tokens: readonly Token[],
	kind: TokenKind,
	start: TokenIndex,
): TokenIndex | undefined {
	for (let i = Math.max(0, start); i < tokens.length; i++) {
		if (tokens[i]?.kind === kind) return i;
	}
	return undefined;
}
