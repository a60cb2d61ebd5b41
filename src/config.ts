import { loadConfig } from "c12";
import { z } from "zod";
import { validateTextDomain } from "./cli-utils.js";
import { logWarning } from "./logger.js";
import type { TextDomainConfig, TextDomainUserConfig } from "./types.js";

export const DEFAULT_INCLUDE = ["**/*.php"];
export const DEFAULT_EXCLUDE = ["vendor/**", "node_modules/**"];

const configSchema = z
	.object({
		originalTextDomain: z.string().default(""),
		targetTextDomain: z.string().default(""),
		include: z.array(z.string().min(1)).min(1).default([...DEFAULT_INCLUDE]),
		exclude: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE]),
		concurrency: z.number().int().positive().default(10),
	})
	.refine((data) => validateTextDomain(data.targetTextDomain), {
		message: "must not contain quotes or backslashes",
		path: ["targetTextDomain"],
	});

export function defineConfig(config: TextDomainUserConfig) {
	return config;
}

export function parseConfig(raw: unknown): TextDomainConfig {
	const result = configSchema.safeParse(raw ?? {});
	if (!result.success) {
		const errors = result.error.issues
			.map((i) => `  - ${i.path.join(".")}: ${i.message}`)
			.join("\n");
		throw new Error(`Invalid config:\n${errors}`);
	}

	const config = result.data;
	if (
		config.targetTextDomain !== "" &&
		config.originalTextDomain === config.targetTextDomain
	) {
		logWarning(
			`originalTextDomain and targetTextDomain are both "${config.targetTextDomain}"; fixes will not change anything.`,
		);
	}
	return config;
}

export async function loadTextDomainConfig(
	overrides: TextDomainUserConfig = {},
	cwd: string = process.cwd(),
): Promise<TextDomainConfig> {
	const { config } = await loadConfig({
		name: "textdomain",
		cwd,
		overrides: stripUndefined(overrides),
	});
	return parseConfig(config);
}

function stripUndefined(config: TextDomainUserConfig): TextDomainUserConfig {
	const out: TextDomainUserConfig = {};
	if (config.originalTextDomain !== undefined)
		out.originalTextDomain = config.originalTextDomain;
	if (config.targetTextDomain !== undefined)
		out.targetTextDomain = config.targetTextDomain;
	if (config.include !== undefined) out.include = config.include;
	if (config.exclude !== undefined) out.exclude = config.exclude;
	if (config.concurrency !== undefined) out.concurrency = config.concurrency;
	return out;
}
