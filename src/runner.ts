import { readFile, writeFile } from "node:fs/promises";
import pLimit from "p-limit";
import { glob } from "tinyglobby";
import { fixSource, lintSource } from "./host/fixer.js";
import { createTextDomainRule } from "./rule/text-domain.js";
import type { FileReport, LintRule, RunResult, TextDomainConfig } from "./types.js";

export interface RunOptions extends TextDomainConfig {
  fix?: boolean;
  dryRun?: boolean;
  onProgress?: (completed: number, total: number) => void;
}

function emptyResult(): RunResult {
  return {
    files: [],
    filesScanned: 0,
    filesWithIssues: 0,
    filesModified: 0,
    totalIssues: 0,
    totalFixed: 0,
  };
}

async function processFile(
  filePath: string,
  rules: readonly LintRule[],
  options: RunOptions,
): Promise<FileReport> {
  let code: string;
  try {
    code = await readFile(filePath, "utf-8");
  } catch (err) {
    return {
      filePath,
      diagnostics: [],
      fixed: 0,
      modified: false,
      converged: true,
      error: `Could not read file: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const diagnostics = lintSource(code, rules);
  if (!options.fix || diagnostics.length === 0) {
    return { filePath, diagnostics, fixed: 0, modified: false, converged: true };
  }

  const result = fixSource(code, rules);
  const modified = result.output !== code;
  if (modified && !options.dryRun) {
    await writeFile(filePath, result.output, "utf-8");
  }

  return {
    filePath,
    diagnostics,
    fixed: result.fixed,
    modified,
    converged: result.converged,
  };
}

/**
 * Checks (or fixes) every file matched by the include patterns.
 * Nothing is read when no target domain is configured.
 */
export async function run(
  options: RunOptions,
  cwd: string = process.cwd(),
): Promise<RunResult> {
  if (!options.targetTextDomain) return emptyResult();

  const files = await glob(options.include, {
    ignore: options.exclude,
    cwd,
    absolute: true,
  });
  files.sort();

  const rules = [
    createTextDomainRule({
      originalTextDomain: options.originalTextDomain,
      targetTextDomain: options.targetTextDomain,
    }),
  ];

  const limit = pLimit(options.concurrency);
  let completed = 0;

  const reports = await Promise.all(
    files.map((filePath) =>
      limit(async () => {
        const report = await processFile(filePath, rules, options);
        completed++;
        options.onProgress?.(completed, files.length);
        return report;
      }),
    ),
  );

  const result = emptyResult();
  result.filesScanned = files.length;

  for (const report of reports) {
    if (report.diagnostics.length === 0 && !report.error) continue;
    result.files.push(report);
    if (report.diagnostics.length > 0) result.filesWithIssues++;
    if (report.modified) result.filesModified++;
    result.totalIssues += report.diagnostics.length;
    result.totalFixed += report.fixed;
  }

  return result;
}
