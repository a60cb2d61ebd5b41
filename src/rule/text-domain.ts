import { findNextToken } from "../tokenizer/find.js";
import type {
	Finding,
	LintRule,
	RuleFile,
	TextDomainOptions,
	Token,
	TokenIndex,
	TokenKind,
} from "../types.js";
import { getCallArguments, resolveTextDomainArgument } from "./arguments.js";
import { isTranslationFunction } from "./translation-functions.js";

export const RULE_NAME = "text-domain";
export const REPLACE_DOMAIN_CODE = "ReplaceDomain";

type FindNext = (kind: TokenKind, start: TokenIndex) => TokenIndex | undefined;

function isQuote(ch: string | undefined): boolean {
	return ch === "'" || ch === '"';
}

/** Drops one leading and one trailing quote; escapes are left as written. */
export function stripQuotes(raw: string): string {
	let start = 0;
	let end = raw.length;
	if (isQuote(raw[start])) start++;
	if (end > start && isQuote(raw[end - 1])) end--;
	return raw.slice(start, end);
}

export function formatMessage(
	functionName: string,
	options: TextDomainOptions,
): string {
	return `Text domain "${options.originalTextDomain}" in function ${functionName}() should be replaced with "${options.targetTextDomain}".`;
}

/**
 * Checks the call that starts at the identifier `position`. Returns a
 * finding when its last string-literal argument holds the original domain.
 */
export function inspectCallSite(
	tokens: readonly Token[],
	position: TokenIndex,
	options: TextDomainOptions,
	findNext: FindNext = (kind, start) => findNextToken(tokens, kind, start),
): Finding | undefined {
	const token = tokens[position];
	if (!token || token.kind !== "identifier") return undefined;
	if (!isTranslationFunction(token.text)) return undefined;

	const openParen = findNext("open-paren", position);
	if (openParen === undefined) return undefined;

	const literal = resolveTextDomainArgument(
		getCallArguments(tokens, openParen),
	);
	if (literal === undefined) return undefined;

	const raw = tokens[literal]?.text ?? "";
	const textDomain = stripQuotes(raw);
	if (textDomain !== options.originalTextDomain) return undefined;

	return {
		position: literal,
		functionName: token.text,
		textDomain,
		replacement: `'${options.targetTextDomain}'`,
		message: formatMessage(token.text, options),
		code: REPLACE_DOMAIN_CODE,
	};
}

export function scanTokens(
	tokens: readonly Token[],
	options: TextDomainOptions,
): Finding[] {
	if (!options.targetTextDomain) return [];

	const findings: Finding[] = [];
	for (let i = 0; i < tokens.length; i++) {
		const finding = inspectCallSite(tokens, i, options);
		if (finding) findings.push(finding);
	}
	return findings;
}

export function createTextDomainRule(options: TextDomainOptions): LintRule {
	const settings: TextDomainOptions = Object.freeze({
		originalTextDomain: options.originalTextDomain,
		targetTextDomain: options.targetTextDomain,
	});

	return {
		name: RULE_NAME,
		register: () => ["identifier"],
		process(file: RuleFile, position: TokenIndex): void {
			if (!settings.targetTextDomain) return;

			const finding = inspectCallSite(
				file.tokens,
				position,
				settings,
				(kind, start) => file.findNext(kind, start),
			);
			if (!finding) return;

			const fix = file.addFixableError(
				finding.message,
				finding.position,
				finding.code,
			);
			if (fix) {
				file.fixer.replaceToken(finding.position, finding.replacement);
			}
		},
	};
}
