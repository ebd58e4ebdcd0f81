import { promises as fs } from "fs";
import path from "path";
import type { PackageAnalysis, PackageAnalyzer } from "../analysis/packageAnalyzer.js";
import { toPackageMap } from "../analysis/packageAnalyzer.js";
import { printPackageSummary } from "../analysis/summary.js";
import { sha256Prefixed, stableJsonStringify, stablePrettyJson } from "../core/canonicalJson.js";
import { fileStamp, systemClock, type Clock } from "../core/clock.js";
import type { InstallRecord } from "../core/installRecord.js";
import type { JsonObject } from "../core/json.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import type { TrackerConfig } from "../config/trackerConfig.js";
import type { RuntimeInfo } from "../execution/rSession.js";
import { toLoggedRecord, type InstallLogStore } from "../store/installLog.js";
import { selectContainerCommands, selectInstallCommands } from "./commandSelection.js";
import {
  renderContainerScript,
  renderInstallScript,
  type ContainerScriptFormat,
  type RepositorySettings
} from "./scriptRender.js";

export const DEFAULT_INSTALL_SCRIPT = "install_r_packages.R";
export const DEFAULT_CONTAINER_SCRIPT = "install_for_container.R";
export const DEFAULT_CONTAINER_DEFINITION = "r-environment.def";

export interface ReproducibilityReport {
  generatedAt: string;
  rVersion: string;
  platform: string;
  libPath: string;
  configHash: `sha256:${string}`;
  totalPackages: number;
  manuallyInstalledCount: number;
  dependenciesCount: number;
  libraryFingerprint: `sha256:${string}`;
  installHistory: InstallRecord[];
  analysis: PackageAnalysis;
}

export interface GeneratedScript {
  text: string;
  commands: string[];
  path: string | null;
}

export function toReportJson(report: ReproducibilityReport): JsonObject {
  return {
    generated_at: report.generatedAt,
    r_version: report.rVersion,
    platform: report.platform,
    lib_path: report.libPath,
    config_hash: report.configHash,
    total_packages: report.totalPackages,
    manually_installed_count: report.manuallyInstalledCount,
    dependencies_count: report.dependenciesCount,
    library_fingerprint: report.libraryFingerprint,
    install_history: report.installHistory.map(toLoggedRecord),
    manually_installed: toPackageMap(report.analysis.manuallyInstalled),
    dependencies: toPackageMap(report.analysis.dependencies)
  };
}

export function libraryFingerprint(analysis: PackageAnalysis): `sha256:${string}` {
  return sha256Prefixed(
    stableJsonStringify({
      manually_installed: toPackageMap(analysis.manuallyInstalled),
      dependencies: toPackageMap(analysis.dependencies)
    })
  );
}

export class ReproducibilityGenerator {
  private readonly clock: Clock;

  constructor(
    private readonly deps: {
      config: TrackerConfig;
      runtime: RuntimeInfo;
      analyzer: PackageAnalyzer;
      log: InstallLogStore;
      output: SessionOutput;
      clock?: Clock;
    }
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  private resolveOutput(p: string): string {
    return path.resolve(this.deps.config.projectDir, p);
  }

  private repositories(): RepositorySettings {
    return { cranRepo: this.deps.config.cranRepo, timeoutSeconds: this.deps.config.networkTimeoutSeconds };
  }

  private async writeScript(filePath: string, text: string, executable: boolean): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text + "\n", "utf8");
    if (executable) await fs.chmod(filePath, 0o755);
  }

  async generateReport(
    outputPath?: string | null,
    analysis?: PackageAnalysis
  ): Promise<{ path: string; report: ReproducibilityReport }> {
    const snapshot = analysis ?? (await this.deps.analyzer.analyze());
    const installHistory = await this.deps.log.readAll();
    const now = this.clock();

    const report: ReproducibilityReport = {
      generatedAt: now.toISOString(),
      rVersion: this.deps.runtime.rVersion,
      platform: this.deps.runtime.platform,
      libPath: snapshot.summary.libPath,
      configHash: this.deps.config.configHash,
      totalPackages: snapshot.summary.totalPackages,
      manuallyInstalledCount: snapshot.summary.manuallyInstalledCount,
      dependenciesCount: snapshot.summary.dependenciesCount,
      libraryFingerprint: libraryFingerprint(snapshot),
      installHistory,
      analysis: snapshot
    };

    const filePath = this.resolveOutput(outputPath ?? `r_reproducibility_report_${fileStamp(now)}.json`);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, stablePrettyJson(toReportJson(report)), "utf8");

    const { output } = this.deps;
    output.message(`Reproducibility report saved: ${filePath}`);
    output.message(`   Total packages: ${report.totalPackages}`);
    output.message(`   Manually installed: ${report.manuallyInstalledCount}`);
    output.message(`   Dependencies: ${report.dependenciesCount}`);

    return { path: filePath, report };
  }

  async generateInstallScript(
    opts: {
      analysis?: PackageAnalysis;
      preferPinned?: boolean;
      includeDependencies?: boolean;
      outputPath?: string | null;
    } = {}
  ): Promise<GeneratedScript> {
    const analysis = opts.analysis ?? (await this.deps.analyzer.analyze());
    const commands = selectInstallCommands(analysis, {
      preferPinned: opts.preferPinned ?? true,
      includeDependencies: opts.includeDependencies ?? false
    });

    const text = renderInstallScript({
      generatedAt: this.clock(),
      rVersion: this.deps.runtime.rVersion,
      libPathSetting: this.deps.config.libPathSetting,
      repositories: this.repositories(),
      commands
    });

    const outputPath = opts.outputPath === undefined ? DEFAULT_INSTALL_SCRIPT : opts.outputPath;
    if (outputPath === null) return { text, commands, path: null };

    const filePath = this.resolveOutput(outputPath);
    await this.writeScript(filePath, text, true);
    this.deps.output.message(`Install script saved: ${filePath}`);
    this.deps.output.message(`   Commands: ${commands.length}`);
    return { text, commands, path: filePath };
  }

  async generateContainerInstallScript(
    opts: {
      analysis?: PackageAnalysis;
      includeDependencies?: boolean;
      outputPath?: string | null;
      format?: ContainerScriptFormat;
    } = {}
  ): Promise<GeneratedScript> {
    const analysis = opts.analysis ?? (await this.deps.analyzer.analyze());
    const format = opts.format ?? "script";
    const commands = selectContainerCommands(analysis, { includeDependencies: opts.includeDependencies ?? false });
    const rVersion = this.deps.runtime.rVersion;

    const text = renderContainerScript({
      generatedAt: this.clock(),
      rVersion,
      baseImage: this.deps.config.container.baseImage ?? `rocker/r-ver:${rVersion}`,
      format,
      repositories: this.repositories(),
      commands
    });

    const defaultPath = format === "definition" ? DEFAULT_CONTAINER_DEFINITION : DEFAULT_CONTAINER_SCRIPT;
    const outputPath = opts.outputPath === undefined ? defaultPath : opts.outputPath;
    if (outputPath === null) return { text, commands, path: null };

    const filePath = this.resolveOutput(outputPath);
    await this.writeScript(filePath, text, format === "script");
    const { output } = this.deps;
    output.message(`Container install script saved: ${filePath}`);
    output.message(`   Format: ${format}`);
    output.message(`   Commands: ${commands.length}`);
    return { text, commands, path: filePath };
  }

  /** Analysis, report, install script and summary in one pass. */
  async generateFullReproducibility(): Promise<{ analysis: PackageAnalysis; reportPath: string; scriptPath: string }> {
    const { output } = this.deps;
    output.print("Generating complete R reproducibility package...\n");

    output.print("1. Analyzing packages...");
    const analysis = await this.deps.analyzer.analyze();

    output.print("2. Generating reproducibility report...");
    const { path: reportPath } = await this.generateReport(null, analysis);

    output.print("3. Generating install script...");
    const script = await this.generateInstallScript({ analysis });
    const scriptPath = script.path ?? DEFAULT_INSTALL_SCRIPT;

    output.print("4. Package summary:");
    printPackageSummary(analysis, output);

    output.print(
      [
        "",
        "Reproducibility package complete!",
        "Files created:",
        `  - ${reportPath}`,
        `  - ${scriptPath}`,
        "",
        "To reproduce this environment:",
        `  Rscript ${scriptPath}`
      ].join("\n")
    );

    return { analysis, reportPath, scriptPath };
  }
}
