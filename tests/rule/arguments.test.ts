import { describe, expect, it } from "vitest";
import {
	findFirstStringLiteral,
	getCallArguments,
	resolveTextDomainArgument,
} from "../../src/rule/arguments.js";
import { findNextToken } from "../../src/tokenizer/find.js";
import { tokenize } from "../../src/tokenizer/lexer.js";
import type { Token } from "../../src/types.js";

function firstOpenParen(tokens: Token[]): number {
	const index = findNextToken(tokens, "open-paren", 0);
	if (index === undefined) throw new Error("no open paren in fixture");
	return index;
}

function literalsOf(code: string): string[] {
	const tokens = tokenize(`<?php ${code}`);
	return getCallArguments(tokens, firstOpenParen(tokens)).map(
		(i) => tokens[i]?.text ?? "",
	);
}

describe("getCallArguments", () => {
	it("returns the literal of each argument in order", () => {
		expect(literalsOf("__( 'Hello', 'old-domain' );")).toEqual([
			"'Hello'",
			"'old-domain'",
		]);
	});

	it("returns an empty list for a call without arguments", () => {
		expect(literalsOf("__();")).toEqual([]);
	});

	it("leaves out arguments that contain no string literal", () => {
		expect(literalsOf("_n( 'One', 'Many', $count, 'old' );")).toEqual([
			"'One'",
			"'Many'",
			"'old'",
		]);
		expect(literalsOf("__( 'Hello', $variable_domain );")).toEqual([
			"'Hello'",
		]);
	});

	it("ignores commas inside nested calls", () => {
		expect(literalsOf("__( foo( 'x', 'y' ), 'mydomain' );")).toEqual([
			"'x'",
			"'mydomain'",
		]);
		expect(literalsOf("__( array( 'a', 'b' ) );")).toEqual(["'a'"]);
	});

	it("takes the first literal of a concatenated argument", () => {
		expect(literalsOf("__( 'a' . 'b', 'd' );")).toEqual(["'a'", "'d'"]);
	});

	it("keeps commas and parens inside literals out of the count", () => {
		expect(literalsOf("__( 'a(b, c', 'old' );")).toEqual([
			"'a(b, c'",
			"'old'",
		]);
	});

	it("stops at the call's own closing paren", () => {
		expect(literalsOf("__( 'a' ); _e( 'b', 'c' );")).toEqual(["'a'"]);
	});

	it("drops the pending argument when the call never closes", () => {
		expect(literalsOf("__( 'a', 'b'")).toEqual(["'a'"]);
	});

	it("does not treat interpolated strings as literals", () => {
		expect(literalsOf('__( "Hi $name", "old" );')).toEqual(['"old"']);
	});
});

describe("findFirstStringLiteral", () => {
	const tokens = tokenize("<?php $a . 'x' . 'y'");

	it("searches a half-open range", () => {
		const x = tokens.findIndex((t) => t.text === "'x'");
		expect(findFirstStringLiteral(tokens, 0, tokens.length)).toBe(x);
		expect(findFirstStringLiteral(tokens, 0, x)).toBeUndefined();
	});
});

describe("resolveTextDomainArgument", () => {
	it("returns the last entry", () => {
		expect(resolveTextDomainArgument([3, 7, 12])).toBe(12);
	});

	it("returns undefined for an empty list", () => {
		expect(resolveTextDomainArgument([])).toBeUndefined();
	});
});
