import type { Token, TokenIndex } from "../types.js";

export function findFirstStringLiteral(
	tokens: readonly Token[],
	start: TokenIndex,
	end: TokenIndex,
): TokenIndex | undefined {
	for (let i = start; i < end; i++) {
		if (tokens[i]?.kind === "string-literal") return i;
	}
	return undefined;
}

/**
 * Splits the argument list opened at `openParen` into its top-level
 * arguments and returns, in order, the first string literal of each one.
 * Arguments without a string literal are left out, so the result can be
 * shorter than the argument count.
 */
export function getCallArguments(
	tokens: readonly Token[],
	openParen: TokenIndex,
): TokenIndex[] {
	const literals: TokenIndex[] = [];
	let depth = 1;
	let argStart = openParen + 1;

	for (let i = openParen + 1; i < tokens.length; i++) {
		const kind = tokens[i]?.kind;

		if (kind === "open-paren") {
			depth++;
		} else if (kind === "close-paren") {
			depth--;
			if (depth === 0) {
				const literal = findFirstStringLiteral(tokens, argStart, i);
				if (literal !== undefined) literals.push(literal);
				break;
			}
		} else if (kind === "comma" && depth === 1) {
			const literal = findFirstStringLiteral(tokens, argStart, i);
			if (literal !== undefined) literals.push(literal);
			argStart = i + 1;
		}
	}

	return literals;
}

/** The text domain is always the final parameter of a translation call. */
export function resolveTextDomainArgument(
	literals: readonly TokenIndex[],
): TokenIndex | undefined {
	return literals.length > 0 ? literals[literals.length - 1] : undefined;
}
