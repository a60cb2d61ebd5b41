import { findNextToken } from "../tokenizer/find.js";
import { tokenize } from "../tokenizer/lexer.js";
import type {
	Diagnostic,
	Fixer,
	LintRule,
	RuleFile,
	Token,
	TokenIndex,
	TokenKind,
} from "../types.js";

export interface SourceFileOptions {
	/** Accept every fixable error and record the replacement. */
	fix?: boolean;
}

class TokenFixer implements Fixer {
	readonly replacements = new Map<TokenIndex, string>();

	constructor(private readonly tokenCount: number) {}

	replaceToken(position: TokenIndex, text: string): void {
		if (position < 0 || position >= this.tokenCount) {
			throw new Error(
				`Cannot replace token ${position}: file has ${this.tokenCount} tokens`,
			);
		}
		this.replacements.set(position, text);
	}
}

/**
 * One tokenized file plus the diagnostics rules report against it.
 */
export class SourceFile implements RuleFile {
	readonly tokens: readonly Token[];
	readonly fixer: TokenFixer;
	private readonly diagnostics: Diagnostic[] = [];
	private readonly fix: boolean;
	private currentRule = "";
	private fixCount = 0;

	constructor(
		readonly contents: string,
		options: SourceFileOptions = {},
	) {
		this.tokens = tokenize(contents);
		this.fixer = new TokenFixer(this.tokens.length);
		this.fix = options.fix ?? false;
	}

	findNext(kind: TokenKind, start: TokenIndex): TokenIndex | undefined {
		return findNextToken(this.tokens, kind, start);
	}

	addFixableError(
		message: string,
		position: TokenIndex,
		code: string,
	): boolean {
		const token = this.tokens[position];
		this.diagnostics.push({
			rule: this.currentRule,
			code,
			message,
			line: token?.line ?? 1,
			column: token?.column ?? 1,
			fixable: true,
		});
		if (this.fix) this.fixCount++;
		return this.fix;
	}

	/** Runs each rule on every token of a kind it registered. */
	process(rules: readonly LintRule[]): void {
		const listeners = rules.map((rule) => ({
			rule,
			kinds: new Set(rule.register()),
		}));

		for (let i = 0; i < this.tokens.length; i++) {
			const kind = this.tokens[i]?.kind;
			if (kind === undefined) continue;
			for (const { rule, kinds } of listeners) {
				if (!kinds.has(kind)) continue;
				this.currentRule = rule.name;
				rule.process(this, i);
			}
		}
		this.currentRule = "";
	}

	getDiagnostics(): Diagnostic[] {
		return [...this.diagnostics];
	}

	getFixCount(): number {
		return this.fixCount;
	}

	getContents(): string {
		if (this.fixer.replacements.size === 0) return this.contents;
		return this.tokens
			.map((token, i) => this.fixer.replacements.get(i) ?? token.text)
			.join("");
	}
}
