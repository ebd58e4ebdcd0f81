import { promises as fs } from "fs";
import path from "path";
import type { InstallRecord } from "../core/installRecord.js";
import type { JsonObject } from "../core/json.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import type { TrackerConfig } from "../config/trackerConfig.js";
import type { RuntimeInfo } from "../execution/rSession.js";
import { plainInstallCommand } from "../install/installer.js";
import type { InstallMethod } from "../sources/installSources.js";
import type { InstallLogStore } from "../store/installLog.js";
import { field, readDescriptor, type DescriptorFields } from "./descriptor.js";
import { extractInstallCalls, findHistoryMatch, readHistoryLines } from "./rhistory.js";
import { reproduceInstallCommand } from "./reproduceCommand.js";

export type PackageClassification = "manual" | "dependency";
export type MatchSource = "log" | "history" | "none";

export interface PackageMetadata {
  name: string;
  version: string | null;
  repository: string | null;
  remoteType: string | null;
  remoteRepo: string | null;
  remoteUsername: string | null;
  remoteRef: string | null;
  descriptor: DescriptorFields;
  // The tracked wrapper invocation, or the raw history line.
  installCommandUsed: string | null;
  actualInstallCommand: string | null;
  reproduceInstall: string;
  installTimestamp: string | null;
  installMethod: InstallMethod | null;
  matchedBy: MatchSource;
  classification: PackageClassification;
}

export interface AnalysisSummary {
  totalPackages: number;
  manuallyInstalledCount: number;
  dependenciesCount: number;
  rVersion: string;
  libPath: string;
}

export interface PackageAnalysis {
  manuallyInstalled: Map<string, PackageMetadata>;
  dependencies: Map<string, PackageMetadata>;
  summary: AnalysisSummary;
}

export const DESCRIPTOR_FILE = "DESCRIPTION";

/** `owner/repo@ref` (or `owner/repo/subdir`) names the package after its last path segment. */
export function requestedPackageName(requested: string): string {
  const bare = requested.split(/[@#]/)[0] ?? requested;
  const segments = bare.split("/").filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? bare;
}

/** First record, in log order, that requested `name`. */
export function findLogMatch(records: readonly InstallRecord[], name: string): InstallRecord | null {
  return (
    records.find((r) => r.packages.some((p) => p === name || (p.includes("/") && requestedPackageName(p) === name))) ??
    null
  );
}

export function describePackage(
  name: string,
  descriptor: DescriptorFields,
  logMatch: InstallRecord | null,
  historyMatch: string | null
): PackageMetadata {
  const provenance = {
    name,
    version: field(descriptor, "Version"),
    repository: field(descriptor, "Repository"),
    remoteType: field(descriptor, "RemoteType"),
    remoteRepo: field(descriptor, "RemoteRepo"),
    remoteUsername: field(descriptor, "RemoteUsername"),
    remoteRef: field(descriptor, "RemoteRef")
  };

  const matchedBy: MatchSource = logMatch ? "log" : historyMatch !== null ? "history" : "none";
  const installCommandUsed = logMatch ? logMatch.command : historyMatch;
  const actualInstallCommand = logMatch
    ? logMatch.actualCommand ?? null
    : historyMatch !== null
      ? plainInstallCommand(historyMatch)
      : null;

  return {
    ...provenance,
    descriptor,
    installCommandUsed,
    actualInstallCommand,
    reproduceInstall: reproduceInstallCommand(provenance),
    installTimestamp: logMatch?.timestamp ?? null,
    installMethod: logMatch?.method ?? null,
    matchedBy,
    classification: matchedBy === "none" ? "dependency" : "manual"
  };
}

async function listPackageDirs(libPath: string): Promise<string[]> {
  const entries = await fs.readdir(libPath, { withFileTypes: true });
  const dirs: string[] = [];
  for (const e of entries) {
    if (e.isDirectory()) {
      dirs.push(e.name);
    } else if (e.isSymbolicLink()) {
      const st = await fs.stat(path.join(libPath, e.name)).catch(() => null);
      if (st?.isDirectory()) dirs.push(e.name);
    }
  }
  return dirs.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export class PackageAnalyzer {
  constructor(
    private readonly deps: {
      config: TrackerConfig;
      runtime: RuntimeInfo;
      log: InstallLogStore;
      output: SessionOutput;
    }
  ) {}

  async analyze(opts: { libPath?: string; rhistoryPath?: string } = {}): Promise<PackageAnalysis> {
    const libPath = opts.libPath ?? this.deps.config.libPath;
    const rhistoryPath = opts.rhistoryPath ?? this.deps.config.rhistoryPath;

    const manuallyInstalled = new Map<string, PackageMetadata>();
    const dependencies = new Map<string, PackageMetadata>();
    const result = (): PackageAnalysis => ({
      manuallyInstalled,
      dependencies,
      summary: {
        totalPackages: manuallyInstalled.size + dependencies.size,
        manuallyInstalledCount: manuallyInstalled.size,
        dependenciesCount: dependencies.size,
        rVersion: this.deps.runtime.rVersion,
        libPath
      }
    });

    if (!(await isDirectory(libPath))) {
      this.deps.output.message(`R library directory not found: ${libPath}`);
      return result();
    }

    const installCalls = extractInstallCalls(await readHistoryLines(rhistoryPath));
    const records = await this.deps.log.readAll();

    for (const name of await listPackageDirs(libPath)) {
      const descriptor = await readDescriptor(path.join(libPath, name, DESCRIPTOR_FILE));
      if (!descriptor) continue;

      const logMatch = findLogMatch(records, name);
      const historyMatch = logMatch ? null : findHistoryMatch(installCalls, name);
      const meta = describePackage(name, descriptor, logMatch, historyMatch);

      if (meta.classification === "manual") manuallyInstalled.set(name, meta);
      else dependencies.set(name, meta);
    }

    return result();
  }
}

export function toPackageSummary(p: PackageMetadata): JsonObject {
  return {
    name: p.name,
    version: p.version,
    repository: p.repository,
    remote_type: p.remoteType,
    remote_repo: p.remoteRepo,
    remote_username: p.remoteUsername,
    remote_ref: p.remoteRef,
    description_fields: p.descriptor,
    install_command_used: p.installCommandUsed,
    actual_install_command: p.actualInstallCommand,
    reproduce_install: p.reproduceInstall,
    install_timestamp: p.installTimestamp,
    install_method: p.installMethod,
    matched_by: p.matchedBy,
    classification: p.classification
  };
}

export function toPackageMap(packages: ReadonlyMap<string, PackageMetadata>): JsonObject {
  const out: JsonObject = {};
  for (const [name, meta] of packages) out[name] = toPackageSummary(meta);
  return out;
}

export function toAnalysisSummary(s: AnalysisSummary): JsonObject {
  return {
    total_packages: s.totalPackages,
    manually_installed_count: s.manuallyInstalledCount,
    dependencies_count: s.dependenciesCount,
    r_version: s.rVersion,
    lib_path: s.libPath
  };
}
