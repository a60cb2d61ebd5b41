import type { Diagnostic, LintRule } from "../types.js";
import { SourceFile } from "./source-file.js";

export interface FixOptions {
	maxPasses?: number;
}

export interface FixResult {
	output: string;
	fixed: number;
	passes: number;
	converged: boolean;
}

export const DEFAULT_MAX_PASSES = 50;

export function lintSource(
	source: string,
	rules: readonly LintRule[],
): Diagnostic[] {
	const file = new SourceFile(source);
	file.process(rules);
	return file.getDiagnostics();
}

/**
 * Applies fixes pass by pass, re-tokenizing in between, until a pass has
 * nothing left to fix. A pass whose fixes leave the text unchanged would
 * repeat forever, so it ends the loop with `converged: false`.
 */
export function fixSource(
	source: string,
	rules: readonly LintRule[],
	options: FixOptions = {},
): FixResult {
	const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
	let output = source;
	let fixed = 0;
	let passes = 0;

	while (passes < maxPasses) {
		passes++;
		const file = new SourceFile(output, { fix: true });
		file.process(rules);

		const count = file.getFixCount();
		if (count === 0) {
			return { output, fixed, passes, converged: true };
		}

		const next = file.getContents();
		if (next === output) {
			return { output, fixed, passes, converged: false };
		}

		fixed += count;
		output = next;
	}

	return { output, fixed, passes, converged: false };
}
