#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { parseFormat, parsePatternList, type ReportFormat } from "./cli-utils.js";
import { loadTextDomainConfig } from "./config.js";
import {
	logError,
	logFileReport,
	logInfo,
	logJsonReport,
	logProgress,
	logProgressClear,
	logStart,
	logSuccess,
	logSummary,
	logVerbose,
	logWarning,
} from "./logger.js";
import { run } from "./runner.js";
import type { RunResult, TextDomainConfig } from "./types.js";

const sharedArgs = {
	original: {
		type: "string",
		description: "Text domain to replace (overrides config)",
	},
	target: {
		type: "string",
		description: "Text domain to use instead (overrides config)",
	},
	include: {
		type: "string",
		description: "Comma-separated glob patterns to scan",
	},
	format: {
		type: "string",
		description: "Report format: stylish or json",
		default: "stylish",
	},
	verbose: {
		type: "boolean",
		description: "Verbose output",
		default: false,
	},
} as const;

interface SharedArgs {
	original?: string;
	target?: string;
	include?: string;
	format?: string;
	verbose?: boolean;
}

function fail(err: unknown): never {
	logError(err instanceof Error ? err.message : String(err));
	process.exit(2);
}

async function resolveConfig(args: SharedArgs): Promise<TextDomainConfig> {
	return loadTextDomainConfig({
		originalTextDomain: args.original,
		targetTextDomain: args.target,
		include: parsePatternList(args.include),
	});
}

function report(
	result: RunResult,
	format: ReportFormat,
	fix: boolean,
	dryRun: boolean,
): void {
	if (format === "json") {
		logJsonReport(result);
		return;
	}
	for (const file of result.files) {
		logFileReport(file, process.cwd(), dryRun);
	}
	logSummary(result, fix);
}

async function execute(args: SharedArgs, fix: boolean, dryRun: boolean) {
	let format: ReportFormat;
	let config: TextDomainConfig;
	try {
		format = parseFormat(args.format);
		config = await resolveConfig(args);
	} catch (err) {
		fail(err);
	}

	if (!config.targetTextDomain) {
		logWarning(
			"No targetTextDomain configured. Set it in textdomain.config.ts or pass --target.",
		);
		return undefined;
	}

	const stylish = format === "stylish";
	if (stylish) logStart(config, fix);
	const verbose = stylish && (args.verbose ?? false);
	logVerbose(`include: ${config.include.join(", ")}`, verbose);
	logVerbose(`exclude: ${config.exclude.join(", ")}`, verbose);

	let result: RunResult;
	try {
		result = await run({
			...config,
			fix,
			dryRun,
			onProgress: stylish
				? (c, t) => logProgress(c, t, "Scanning...")
				: undefined,
		});
	} catch (err) {
		logProgressClear();
		fail(err);
	}
	logProgressClear();

	report(result, format, fix, dryRun);
	return result;
}

const checkCommand = defineCommand({
	meta: {
		name: "check",
		description: "Report translation calls that use the old text domain",
	},
	args: sharedArgs,
	async run({ args }) {
		const result = await execute(args, false, false);
		if (result && result.totalIssues > 0) {
			process.exit(1);
		}
	},
});

const fixCommand = defineCommand({
	meta: {
		name: "fix",
		description: "Rewrite the old text domain to the new one",
	},
	args: {
		...sharedArgs,
		"dry-run": {
			type: "boolean",
			description: "Show what would change without writing files",
			default: false,
		},
	},
	async run({ args }) {
		const dryRun = args["dry-run"];
		const result = await execute(args, true, dryRun);
		if (!result) return;

		if (result.filesModified > 0 && parseFormat(args.format) === "stylish") {
			if (dryRun) {
				logInfo(`Dry run: ${result.filesModified} file(s) would be modified.`);
			} else {
				logSuccess(`Rewrote ${result.filesModified} file(s).`);
			}
		}
		if (result.files.some((f) => !f.converged)) {
			process.exit(1);
		}
	},
});

const initCommand = defineCommand({
	meta: {
		name: "init",
		description: "Interactive setup wizard for textdomain-fixer",
	},
	async run() {
		const { runInitWizard } = await import("./init.js");
		await runInitWizard();
	},
});

const main = defineCommand({
	meta: {
		name: "textdomain-fixer",
		version: "0.1.0",
		description: "Find and rewrite WordPress text domains in PHP source",
	},
	subCommands: {
		check: checkCommand,
		fix: fixCommand,
		init: initCommand,
	},
});

runMain(main);
