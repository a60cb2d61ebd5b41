import type { Token, TokenKind } from "../types.js";

// Tokenizer for PHP source, coarse enough for token-stream rules.
//
// Every character of the input ends up in exactly one token, so joining the
// token texts reproduces the source. Keywords, operators and casts are not
// told apart: they come out as identifiers and one-character `other` tokens.

const IDENT_START = /[A-Za-z_\x80-\uffff]/;
const IDENT_RUN = /[A-Za-z0-9_\x80-\uffff]*/y;
const WHITESPACE_RUN = /[ \t\r\n\f\v]+/y;
const NUMBER_RUN = /[0-9][0-9A-Za-z_.]*/y;
const HEREDOC_START =
	/<<<[ \t]*(["']?)([A-Za-z_\x80-\uffff][A-Za-z0-9_\x80-\uffff]*)\1\r?\n/y;

function isWhitespace(ch: string | undefined): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isIdentStart(ch: string | undefined): boolean {
	return ch != null && IDENT_START.test(ch);
}

function matchSticky(re: RegExp, source: string, at: number): string | null {
	re.lastIndex = at;
	const m = re.exec(source);
	return m ? m[0] : null;
}

/**
 * Scans a quoted string starting at `start` (the opening quote).
 * Returns the index just past the closing quote, or -1 when the string runs
 * to the end of the input.
 */
function scanQuoted(source: string, start: number, quote: string): number {
	let i = start + 1;
	while (i < source.length) {
		const ch = source[i];
		if (ch === "\\") {
			i += 2;
			continue;
		}
		if (ch === quote) return i + 1;
		i++;
	}
	return -1;
}

/**
 * True when a double-quoted body contains `$name`, `${` or `{$` outside
 * escapes.
 */
export function hasInterpolation(body: string): boolean {
	for (let i = 0; i < body.length; i++) {
		const ch = body[i];
		if (ch === "\\") {
			i++;
			continue;
		}
		if (ch === "$" && isIdentStart(body[i + 1])) return true;
		if (ch === "$" && body[i + 1] === "{") return true;
		if (ch === "{" && body[i + 1] === "$") return true;
	}
	return false;
}

class Lexer {
	private readonly tokens: Token[] = [];
	private pos = 0;
	private line = 1;
	private column = 1;
	private inCode = false;

	constructor(private readonly source: string) {}

	run(): Token[] {
		while (this.pos < this.source.length) {
			if (this.inCode) {
				this.scanCode();
			} else {
				this.scanInlineHtml();
			}
		}
		return this.tokens;
	}

	private emit(kind: TokenKind, end: number): void {
		const text = this.source.slice(this.pos, end);
		this.tokens.push({
			kind,
			text,
			line: this.line,
			column: this.column,
			offset: this.pos,
		});
		for (const ch of text) {
			if (ch === "\n") {
				this.line++;
				this.column = 1;
			} else {
				this.column++;
			}
		}
		this.pos = end;
	}

	private scanInlineHtml(): void {
		const { source } = this;
		let search = this.pos;

		while (true) {
			const at = source.indexOf("<?", search);
			if (at === -1) {
				this.emit("inline-html", source.length);
				return;
			}

			let tagEnd = -1;
			if (source[at + 2] === "=") {
				tagEnd = at + 3;
			} else if (source.slice(at + 2, at + 5).toLowerCase() === "php") {
				const after = source[at + 5];
				if (after === undefined) {
					tagEnd = at + 5;
				} else if (after === "\r" && source[at + 6] === "\n") {
					tagEnd = at + 7;
				} else if (isWhitespace(after)) {
					tagEnd = at + 6;
				}
			}

			if (tagEnd === -1) {
				search = at + 2;
				continue;
			}

			if (at > this.pos) this.emit("inline-html", at);
			this.emit("open-tag", tagEnd);
			this.inCode = true;
			return;
		}
	}

	private scanCode(): void {
		const { source, pos } = this;
		const ch = source[pos];
		const next = source[pos + 1];

		if (ch === "?" && next === ">") {
			let end = pos + 2;
			if (source[end] === "\n") end++;
			else if (source[end] === "\r" && source[end + 1] === "\n") end += 2;
			this.emit("close-tag", end);
			this.inCode = false;
			return;
		}

		const ws = matchSticky(WHITESPACE_RUN, source, pos);
		if (ws) {
			this.emit("whitespace", pos + ws.length);
			return;
		}

		if (ch === "#" && next === "[") {
			this.emit("other", pos + 2);
			return;
		}

		if (ch === "#" || (ch === "/" && next === "/")) {
			this.emit("comment", this.lineCommentEnd(pos));
			return;
		}

		if (ch === "/" && next === "*") {
			const close = source.indexOf("*/", pos + 2);
			this.emit("comment", close === -1 ? source.length : close + 2);
			return;
		}

		if (ch === "'" || ch === '"' || ch === "`") {
			this.scanString(ch);
			return;
		}

		if (ch === "<" && source.startsWith("<<<", pos)) {
			HEREDOC_START.lastIndex = pos;
			const header = HEREDOC_START.exec(source);
			if (header) {
				this.scanHeredoc(header[2] ?? "", header[0].length);
				return;
			}
		}

		if (ch === "$" && isIdentStart(next)) {
			const name = matchSticky(IDENT_RUN, source, pos + 1) ?? "";
			this.emit("variable", pos + 1 + name.length);
			return;
		}

		if (isIdentStart(ch)) {
			const name = matchSticky(IDENT_RUN, source, pos) ?? "";
			this.emit("identifier", pos + name.length);
			return;
		}

		const num = matchSticky(NUMBER_RUN, source, pos);
		if (num) {
			this.emit("number", pos + num.length);
			return;
		}

		if (ch === "(") this.emit("open-paren", pos + 1);
		else if (ch === ")") this.emit("close-paren", pos + 1);
		else if (ch === ",") this.emit("comma", pos + 1);
		else this.emit("other", pos + 1);
	}

	/** Line comments stop before a newline or a closing `?>` tag. */
	private lineCommentEnd(start: number): number {
		const { source } = this;
		let i = start;
		while (i < source.length) {
			const ch = source[i];
			if (ch === "\n" || ch === "\r") break;
			if (ch === "?" && source[i + 1] === ">") break;
			i++;
		}
		return i;
	}

	private scanString(quote: string): void {
		const end = scanQuoted(this.source, this.pos, quote);
		if (end === -1) {
			this.emit("other", this.source.length);
			return;
		}

		let kind: TokenKind = "string-literal";
		if (quote === "`") {
			kind = "other";
		} else if (
			quote === '"' &&
			hasInterpolation(this.source.slice(this.pos + 1, end - 1))
		) {
			kind = "interpolated-string";
		}
		this.emit(kind, end);
	}

	private scanHeredoc(label: string, headerLength: number): void {
		const bodyStart = this.pos + headerLength;
		const closing = new RegExp(
			`^[ \\t]*${label}(?![A-Za-z0-9_\\x80-\\uffff])`,
			"m",
		);
		const found = closing.exec(this.source.slice(bodyStart));
		const end = found
			? bodyStart + found.index + found[0].length
			: this.source.length;
		this.emit("heredoc", end);
	}
}

export function tokenize(source: string): Token[] {
	return new Lexer(source).run();
}
