import * as p from "@clack/prompts";
import { existsSync } from "node:fs";
import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { validateTextDomain, parsePatternList } from "./cli-utils.js";
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE } from "./config.js";

export const CONFIG_FILENAME = "textdomain.config.ts";

export interface ConfigFileOptions {
  originalTextDomain: string;
  targetTextDomain: string;
  include: string[];
  exclude: string[];
}

function quoteList(values: string[]): string {
  return `[${values.map((v) => JSON.stringify(v)).join(", ")}]`;
}

export function generateConfigFile(opts: ConfigFileOptions): string {
  const lines: string[] = [];

  lines.push(`import { defineConfig } from "textdomain-fixer";`);
  lines.push(``);
  lines.push(`export default defineConfig({`);
  lines.push(`  originalTextDomain: ${JSON.stringify(opts.originalTextDomain)},`);
  lines.push(`  targetTextDomain: ${JSON.stringify(opts.targetTextDomain)},`);
  lines.push(`  include: ${quoteList(opts.include)},`);
  if (opts.exclude.length > 0) {
    lines.push(`  exclude: ${quoteList(opts.exclude)},`);
  }
  lines.push(`});`);
  lines.push(``);

  return lines.join("\n");
}

/** Reads `Text Domain:` from a plugin or theme header, if one is present. */
export function detectTextDomain(header: string): string | undefined {
  const match = /^[ \t/*#@]*Text Domain:[ \t]*([^\r\n]+)/im.exec(header);
  const domain = match?.[1]?.trim();
  return domain ? domain : undefined;
}

function cancel(): never {
  p.cancel("Setup cancelled.");
  process.exit(0);
}

async function readHeaderDomain(cwd: string): Promise<string | undefined> {
  const candidates = ["style.css"];
  try {
    for (const entry of await readdir(cwd)) {
      if (entry.endsWith(".php")) candidates.push(entry);
    }
  } catch {
    return undefined;
  }

  for (const name of candidates) {
    const path = join(cwd, name);
    if (!existsSync(path)) continue;
    const head = (await readFile(path, "utf-8")).slice(0, 8192);
    const domain = detectTextDomain(head);
    if (domain) return domain;
  }
  return undefined;
}

export async function runInitWizard(): Promise<void> {
  const cwd = process.cwd();
  const configPath = join(cwd, CONFIG_FILENAME);

  p.intro("textdomain-fixer setup");

  if (existsSync(configPath)) {
    const overwrite = await p.confirm({
      message: `${CONFIG_FILENAME} already exists. Overwrite?`,
    });
    if (p.isCancel(overwrite)) cancel();
    if (!overwrite) {
      p.outro("Keeping existing config.");
      return;
    }
  }

  const detected = await readHeaderDomain(cwd);

  const originalTextDomain = await p.text({
    message: "Text domain to replace:",
    initialValue: detected ?? "",
    validate(value) {
      if (!value) return "Enter the text domain currently used in your code.";
    },
  });
  if (p.isCancel(originalTextDomain)) cancel();

  const targetTextDomain = await p.text({
    message: "Replace it with:",
    validate(value) {
      if (!value) return "Enter the new text domain.";
      if (!validateTextDomain(value)) {
        return "Text domains cannot contain quotes or backslashes.";
      }
      if (value === originalTextDomain) {
        return "The new text domain must differ from the old one.";
      }
    },
  });
  if (p.isCancel(targetTextDomain)) cancel();

  const includeInput = await p.text({
    message: "Include patterns (comma-separated):",
    initialValue: DEFAULT_INCLUDE.join(", "),
  });
  if (p.isCancel(includeInput)) cancel();

  const content = generateConfigFile({
    originalTextDomain,
    targetTextDomain,
    include: parsePatternList(includeInput) ?? [...DEFAULT_INCLUDE],
    exclude: [...DEFAULT_EXCLUDE],
  });

  await writeFile(configPath, content, "utf-8");
  p.log.success(`Written ${CONFIG_FILENAME}`);
  p.outro("Run `textdomain-fixer check` to see what would change.");
}
