import type { PackageAnalysis, PackageMetadata } from "../analysis/packageAnalyzer.js";
import { unknownSourcePlaceholder } from "../analysis/reproduceCommand.js";
import { plainInstallCommand } from "../install/installer.js";

/** The pinned command, or null when only the unknown-source placeholder could be built. */
export function pinnedCommand(meta: PackageMetadata): string | null {
  return meta.reproduceInstall === unknownSourcePlaceholder(meta.name) ? null : meta.reproduceInstall;
}

export function uniqueInOrder(commands: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const c of commands) {
    if (seen.has(c)) continue;
    seen.add(c);
    out.push(c);
  }
  return out;
}

function dependencyCommands(analysis: PackageAnalysis): string[] {
  const out: string[] = [];
  for (const meta of analysis.dependencies.values()) {
    const pinned = pinnedCommand(meta);
    if (pinned !== null) out.push(pinned);
  }
  return out;
}

/**
 * Commands for a tracked environment: pinned (when preferred), else the plain
 * command, else whatever command the log or history recorded. A wrapper invocation
 * is always replaced by its plain command, or dropped when that cannot be recovered.
 */
export function selectInstallCommands(
  analysis: PackageAnalysis,
  opts: { preferPinned: boolean; includeDependencies: boolean }
): string[] {
  const manual: string[] = [];
  for (const meta of analysis.manuallyInstalled.values()) {
    const pinned = opts.preferPinned ? pinnedCommand(meta) : null;
    const recorded = meta.installCommandUsed === null ? null : plainInstallCommand(meta.installCommandUsed);
    const cmd = pinned ?? meta.actualInstallCommand ?? recorded;
    if (cmd !== null) manual.push(cmd);
  }
  return uniqueInOrder([...manual, ...(opts.includeDependencies ? dependencyCommands(analysis) : [])]);
}

/** Commands for a context with no tracker: plain command first, then pinned. Never the wrapper form. */
export function selectContainerCommands(analysis: PackageAnalysis, opts: { includeDependencies: boolean }): string[] {
  const manual: string[] = [];
  for (const meta of analysis.manuallyInstalled.values()) {
    const cmd = meta.actualInstallCommand ?? pinnedCommand(meta);
    if (cmd !== null) manual.push(cmd);
  }
  return uniqueInOrder([...manual, ...(opts.includeDependencies ? dependencyCommands(analysis) : [])]);
}
