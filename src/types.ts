export type TokenKind =
	| "identifier"
	| "variable"
	| "open-paren"
	| "close-paren"
	| "comma"
	| "string-literal"
	| "interpolated-string"
	| "heredoc"
	| "number"
	| "whitespace"
	| "comment"
	| "inline-html"
	| "open-tag"
	| "close-tag"
	| "other";

export interface Token {
	kind: TokenKind;
	text: string;
	line: number;
	column: number;
	offset: number;
}

/** Index into a file's token array. */
export type TokenIndex = number;

export interface TextDomainOptions {
	readonly originalTextDomain: string;
	readonly targetTextDomain: string;
}

export interface Finding {
	position: TokenIndex;
	functionName: string;
	textDomain: string;
	replacement: string;
	message: string;
	code: string;
}

export interface Fixer {
	replaceToken(position: TokenIndex, text: string): void;
}

/**
 * What a rule sees of the file it is checking.
 */
export interface RuleFile {
	readonly tokens: readonly Token[];
	findNext(kind: TokenKind, start: TokenIndex): TokenIndex | undefined;
	/** Returns true when the host wants the fix applied. */
	addFixableError(message: string, position: TokenIndex, code: string): boolean;
	readonly fixer: Fixer;
}

export interface LintRule {
	name: string;
	register(): TokenKind[];
	process(file: RuleFile, position: TokenIndex): void;
}

export interface Diagnostic {
	rule: string;
	code: string;
	message: string;
	line: number;
	column: number;
	fixable: boolean;
}

export type TextDomainConfig = {
	originalTextDomain: string;
	targetTextDomain: string;
	include: string[];
	exclude: string[];
	concurrency: number;
};

export type TextDomainUserConfig = Partial<TextDomainConfig>;

export interface FileReport {
	filePath: string;
	diagnostics: Diagnostic[];
	fixed: number;
	modified: boolean;
	converged: boolean;
	error?: string;
}

export interface RunResult {
	files: FileReport[];
	filesScanned: number;
	filesWithIssues: number;
	filesModified: number;
	totalIssues: number;
	totalFixed: number;
}
