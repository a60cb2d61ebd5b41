import { describe, expect, it, vi } from "vitest";
import { parseConfig } from "../src/config.js";
import { formatFileReport, logJsonReport } from "../src/logger.js";
import type { FileReport, RunResult } from "../src/types.js";

const ANSI = /\x1b\[[0-9;]*m/g;

function plain(lines: string[]): string[] {
	return lines.map((l) => l.replace(ANSI, ""));
}

const diagnostic = {
	rule: "text-domain",
	code: "ReplaceDomain",
	message: "M",
	line: 2,
	column: 14,
	fixable: true,
};

describe("formatFileReport", () => {
	it("lists diagnostics under the relative path", () => {
		const report: FileReport = {
			filePath: "/project/inc/a.php",
			diagnostics: [diagnostic],
			fixed: 0,
			modified: false,
			converged: true,
		};

		expect(plain(formatFileReport(report, "/project"))).toEqual([
			"inc/a.php",
			"  2:14     error  M  text-domain.ReplaceDomain",
		]);
	});

	it("marks fixed diagnostics and non-converging files", () => {
		const report: FileReport = {
			filePath: "/project/a.php",
			diagnostics: [diagnostic],
			fixed: 1,
			modified: true,
			converged: false,
		};

		expect(plain(formatFileReport(report, "/project"))).toEqual([
			"a.php",
			"  2:14     fixed  M  text-domain.ReplaceDomain",
			"  ⚠ fixes did not converge; the same issues are reported on every pass",
		]);
	});

	it("labels fixes as pending on a dry run", () => {
		const report: FileReport = {
			filePath: "/project/a.php",
			diagnostics: [diagnostic],
			fixed: 1,
			modified: true,
			converged: true,
		};

		expect(plain(formatFileReport(report, "/project", true))).toEqual([
			"a.php",
			"  2:14     would fix  M  text-domain.ReplaceDomain",
		]);
	});

	it("shows read errors", () => {
		const report: FileReport = {
			filePath: "/project/a.php",
			diagnostics: [],
			fixed: 0,
			modified: false,
			converged: true,
			error: "Could not read file: EACCES",
		};

		expect(plain(formatFileReport(report, "/project"))).toEqual([
			"a.php",
			"  error  Could not read file: EACCES",
		]);
	});
});

describe("logJsonReport", () => {
	it("keeps stdout valid JSON when config loading warns", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const result: RunResult = {
			files: [],
			filesScanned: 3,
			filesWithIssues: 0,
			filesModified: 0,
			totalIssues: 0,
			totalFixed: 0,
		};

		parseConfig({ originalTextDomain: "same", targetTextDomain: "same" });
		logJsonReport(result);

		const stdout = log.mock.calls.map((args) => args.join(" ")).join("\n");
		expect(JSON.parse(stdout)).toEqual(result);
		expect(warn).toHaveBeenCalledTimes(1);
		log.mockRestore();
		warn.mockRestore();
	});
});
