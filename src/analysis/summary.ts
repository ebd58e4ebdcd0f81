import { promises as fs, type Dirent } from "fs";
import path from "path";
import { errnoCode } from "../core/fsErrors.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import type { PackageAnalysis } from "./packageAnalyzer.js";

export const LIBRARY_DIR_CANDIDATES = ["R_libs", "renv", ".Rlibs"] as const;

export function renderPackageSummary(analysis: PackageAnalysis): string {
  const s = analysis.summary;
  const lines = [
    "",
    "R Package Analysis Summary",
    "=".repeat(50),
    `R version: ${s.rVersion}`,
    `Library path: ${s.libPath}`,
    `Total packages: ${s.totalPackages}`,
    `Manually installed: ${s.manuallyInstalledCount}`,
    `Dependencies: ${s.dependenciesCount}`
  ];

  if (s.dependenciesCount > 0) {
    lines.push("", "Packages without install history:");
    for (const [name, pkg] of analysis.dependencies) {
      lines.push(`  - ${name} (${pkg.version ?? "unknown"})`);
    }
  }
  return lines.join("\n");
}

export function printPackageSummary(analysis: PackageAnalysis, output: SessionOutput): PackageAnalysis {
  output.print(renderPackageSummary(analysis));
  return analysis;
}

export interface LibraryLocation {
  name: string;
  path: string;
  packageCount: number;
}

/** Looks for the usual R library directories under `baseDir` and counts their entries. */
export async function checkLibraries(baseDir: string, output: SessionOutput, rVersion: string): Promise<LibraryLocation[]> {
  const found: LibraryLocation[] = [];
  for (const name of LIBRARY_DIR_CANDIDATES) {
    const libPath = path.join(baseDir, name);
    let entries: Dirent[];
    try {
      entries = await fs.readdir(libPath, { withFileTypes: true });
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") continue;
      throw err;
    }
    found.push({ name, path: libPath, packageCount: entries.filter((e) => e.isDirectory()).length });
  }

  const lines = ["", "Checking for R library installations", "=".repeat(50), ""];
  if (!found.length) {
    lines.push("No R library directories found", `   Expected directories: ${LIBRARY_DIR_CANDIDATES[0]}/`);
    output.print(lines.join("\n"));
    return found;
  }

  for (const lib of found) {
    lines.push(`${lib.name}: ${lib.packageCount} packages`, `   Path: ${lib.path}`);
  }
  lines.push("", `Current R: ${rVersion}`, `Will analyze: ${found[0]?.path ?? ""}`);
  output.print(lines.join("\n"));
  return found;
}
