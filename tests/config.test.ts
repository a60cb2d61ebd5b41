import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadTextDomainConfig, parseConfig } from "../src/config.js";

describe("parseConfig", () => {
	it("fills in defaults", () => {
		expect(parseConfig({})).toEqual({
			originalTextDomain: "",
			targetTextDomain: "",
			include: ["**/*.php"],
			exclude: ["vendor/**", "node_modules/**"],
			concurrency: 10,
		});
	});

	it("treats a missing config as empty", () => {
		expect(parseConfig(undefined).include).toEqual(["**/*.php"]);
	});

	it("rejects a target domain that cannot be single-quoted", () => {
		expect(() => parseConfig({ targetTextDomain: "bad'domain" })).toThrow(
			"Invalid config:\n  - targetTextDomain: must not contain quotes or backslashes",
		);
	});

	it("rejects a non-positive concurrency", () => {
		expect(() => parseConfig({ concurrency: 0 })).toThrow(/concurrency/);
	});

	it("warns when both domains are the same", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		parseConfig({ originalTextDomain: "same", targetTextDomain: "same" });

		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledWith(
			expect.stringContaining('both "same"'),
		);
		expect(log).not.toHaveBeenCalled();
		log.mockRestore();
		warn.mockRestore();
	});
});

describe("loadTextDomainConfig", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "config-test-"));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("uses overrides when there is no config file", async () => {
		const config = await loadTextDomainConfig(
			{ originalTextDomain: "old-domain", targetTextDomain: "new-domain" },
			tempDir,
		);
		expect(config).toMatchObject({
			originalTextDomain: "old-domain",
			targetTextDomain: "new-domain",
			include: ["**/*.php"],
		});
	});

	it("lets overrides win over the config file", async () => {
		await writeFile(
			join(tempDir, "textdomain.config.mjs"),
			`export default { originalTextDomain: "from-file", targetTextDomain: "file-target" };\n`,
			"utf-8",
		);

		const config = await loadTextDomainConfig(
			{ targetTextDomain: "flag-target", include: undefined },
			tempDir,
		);
		expect(config.originalTextDomain).toBe("from-file");
		expect(config.targetTextDomain).toBe("flag-target");
		expect(config.include).toEqual(["**/*.php"]);
	});
});
