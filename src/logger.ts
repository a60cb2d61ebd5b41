import { relative } from "node:path";
import pc from "picocolors";
import type { FileReport, RunResult, TextDomainOptions } from "./types.js";

export function logStart(options: TextDomainOptions, fix: boolean): void {
  const verb = fix ? "fix" : "check";
  console.log(
    `\n${pc.bold("textdomain-fixer")} ${pc.dim("·")} ${verb} ${pc.dim("·")} "${options.originalTextDomain}" ${pc.dim("→")} "${options.targetTextDomain}"\n`,
  );
}

export function formatFileReport(
  report: FileReport,
  cwd: string,
  dryRun = false,
): string[] {
  const lines = [pc.underline(relative(cwd, report.filePath) || report.filePath)];

  if (report.error) {
    lines.push(`  ${pc.red("error")}  ${report.error}`);
  }

  for (const d of report.diagnostics) {
    const where = pc.dim(`${d.line}:${d.column}`.padEnd(8));
    let status = pc.red("error");
    if (report.fixed > 0) {
      status = dryRun ? pc.yellow("would fix") : pc.green("fixed");
    }
    lines.push(`  ${where} ${status}  ${d.message}  ${pc.dim(`${d.rule}.${d.code}`)}`);
  }

  if (!report.converged) {
    lines.push(
      `  ${pc.yellow("⚠")} fixes did not converge; the same issues are reported on every pass`,
    );
  }

  return lines;
}

export function logFileReport(report: FileReport, cwd: string, dryRun = false): void {
  console.log(formatFileReport(report, cwd, dryRun).join("\n"));
  console.log("");
}

export function logSummary(result: RunResult, fix: boolean): void {
  const parts: string[] = [];

  if (result.totalIssues === 0) {
    parts.push(pc.green("no issues"));
  } else {
    parts.push(pc.red(`${result.totalIssues} issues`));
  }
  if (result.totalFixed > 0) {
    parts.push(pc.green(`${result.totalFixed} fixed`));
  }
  if (fix && result.filesModified > 0) {
    parts.push(pc.yellow(`${result.filesModified} files modified`));
  }

  console.log(
    `${pc.bold("Done!")} ${parts.join(pc.dim(" · "))} ${pc.dim(`(${result.filesScanned} files scanned)`)}\n`,
  );
}

export function logJsonReport(result: RunResult): void {
  console.log(JSON.stringify(result, null, 2));
}

export function logProgress(completed: number, total: number, label: string): void {
  if (!process.stdout.isTTY) return;
  process.stdout.write(`\r${pc.cyan("●")} ${label} ${pc.dim(`${completed}/${total}`)}`);
}

export function logProgressClear(): void {
  if (!process.stdout.isTTY) return;
  process.stdout.write("\r\x1b[K");
}

export function logInfo(message: string): void {
  console.log(`${pc.cyan("ℹ")} ${message}`);
}

export function logSuccess(message: string): void {
  console.log(`${pc.green("✔")} ${message}`);
}

export function logError(message: string): void {
  console.error(`${pc.red("✖")} ${message}`);
}

// stderr: stdout carries the `--format json` report.
export function logWarning(message: string): void {
  console.warn(`${pc.yellow("⚠")} ${message}`);
}

export function logVerbose(message: string, verbose: boolean): void {
  if (verbose) {
    console.log(pc.dim(`  ${message}`));
  }
}
