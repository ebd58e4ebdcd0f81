import { promises as fs } from "fs";
import { isNotFound } from "../core/fsErrors.js";

// Legacy fallback for packages installed before (or without) the tracker: best-effort
// text matching over the interactive R history. Only consulted when the install log
// has no record naming the package.

export const INSTALL_CALL_PATTERNS: readonly RegExp[] = [
  /install\.packages\(/,
  /BiocManager::install\(/,
  /biocLite\(/,
  /devtools::install_(?:github|gitlab|bitbucket)\(/,
  /remotes::install_(?:github|cran|bioc|gitlab|bitbucket|version)\(/,
  /pak::pkg_install\(/,
  /\bpackage_install\s*\{/
];

export async function readHistoryLines(filePath: string): Promise<string[]> {
  try {
    const text = await fs.readFile(filePath, "utf8");
    return text.split(/\r?\n/);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

export function extractInstallCalls(lines: readonly string[]): string[] {
  return lines.map((l) => l.trim()).filter((l) => INSTALL_CALL_PATTERNS.some((re) => re.test(l)));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when `name` appears as a quoted argument: `"name"`, `'name'`,
 * `"owner/name"` or `"owner/name@ref"`. Unquoted mentions and names embedded
 * in longer tokens do not count.
 */
export function mentionsPackage(line: string, name: string): boolean {
  const re = new RegExp(`(["'])(?:[A-Za-z0-9._-]+/)?${escapeRegExp(name)}(?:@[^"']*)?\\1`);
  return re.test(line);
}

export function findHistoryMatch(installCalls: readonly string[], name: string): string | null {
  return installCalls.find((line) => mentionsPackage(line, name)) ?? null;
}
