/**
 * Pure functions extracted from cli.ts for testability.
 */

export type ReportFormat = "stylish" | "json";

/**
 * A target domain ends up inside a single-quoted PHP literal, so quotes and
 * backslashes are not allowed.
 */
export function validateTextDomain(domain: string): boolean {
  return !/['"\\]/.test(domain);
}

export function parseFormat(value: string | undefined): ReportFormat {
  if (value === undefined || value === "stylish") return "stylish";
  if (value === "json") return "json";
  throw new Error(`Unknown format "${value}". Use "stylish" or "json".`);
}

/** Splits a comma-separated list of glob patterns. */
export function parsePatternList(value: string | undefined): string[] | undefined {
  if (value == null) return undefined;
  const patterns = value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return patterns.length > 0 ? patterns : undefined;
}
