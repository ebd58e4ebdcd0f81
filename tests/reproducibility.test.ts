import { describe, it, expect, afterEach, vi } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { describePackage, type PackageAnalysis, type PackageMetadata } from "../src/analysis/packageAnalyzer.js";
import type { InstallRecord } from "../src/core/installRecord.js";
import { selectContainerCommands, selectInstallCommands } from "../src/reproduce/commandSelection.js";
import { postInstallLines, postSetupLines, shellSingleQuote } from "../src/reproduce/scriptRender.js";
import { makeProjectDir, makeTestTracker, removeProjectDir, writePackage } from "./helpers.js";

function logged(packages: string[], actualCommand: string): InstallRecord {
  return {
    recordId: null,
    timestamp: "2024-01-01T00:00:00.000Z",
    packages,
    method: "cran",
    rVersion: "4.3.2",
    platform: "p",
    command: `package_install ${JSON.stringify({ method: "cran", packages })}`,
    actualCommand,
    success: true,
    output: null
  };
}

function analysisOf(manual: PackageMetadata[], deps: PackageMetadata[]): PackageAnalysis {
  return {
    manuallyInstalled: new Map(manual.map((m) => [m.name, m])),
    dependencies: new Map(deps.map((m) => [m.name, m])),
    summary: {
      totalPackages: manual.length + deps.length,
      manuallyInstalledCount: manual.length,
      dependenciesCount: deps.length,
      rVersion: "4.3.2",
      libPath: "/proj/R_libs"
    }
  };
}

describe("command selection", () => {
  const ab = logged(["a", "b"], 'install.packages(c("a", "b"))');
  const manual = [
    describePackage("a", { Version: "1.0" }, ab, null),
    describePackage("b", { Version: "2.0" }, ab, null),
    describePackage("c", {}, logged(["c"], 'install.packages("c")'), null)
  ];
  const deps = ["d1", "d2", "d3", "d4", "d5"].map((n) => describePackage(n, { Version: "0.1" }, null, null));
  const analysis = analysisOf(manual, deps);

  it("emits one command per manually installed package, pinned where possible", () => {
    expect(selectInstallCommands(analysis, { preferPinned: true, includeDependencies: false })).toEqual([
      'remotes::install_version("a", version = "1.0")',
      'remotes::install_version("b", version = "2.0")',
      'install.packages("c")'
    ]);
  });

  it("deduplicates shared plain commands", () => {
    expect(selectInstallCommands(analysis, { preferPinned: false, includeDependencies: false })).toEqual([
      'install.packages(c("a", "b"))',
      'install.packages("c")'
    ]);
  });

  it("appends pinned dependency commands on request", () => {
    const all = selectInstallCommands(analysis, { preferPinned: true, includeDependencies: true });
    expect(all).toHaveLength(8);
    expect(all[7]).toBe('remotes::install_version("d5", version = "0.1")');
  });

  it("prefers plain commands for containers", () => {
    expect(selectContainerCommands(analysis, { includeDependencies: false })).toEqual([
      'install.packages(c("a", "b"))',
      'install.packages("c")'
    ]);
  });

  it("skips packages with no usable command", () => {
    const unknown = analysisOf([], [describePackage("mystery", {}, null, null)]);
    expect(selectInstallCommands(unknown, { preferPinned: true, includeDependencies: true })).toEqual([]);
  });
});

describe("container rendering helpers", () => {
  it("quotes for a POSIX shell", () => {
    expect(shellSingleQuote("it's")).toBe(`'it'"'"'s'`);
  });

  it("wraps commands in R -e and keeps comments as comments", () => {
    expect(postInstallLines(['install.packages("x")', "# Unknown source for y"])).toEqual([
      `    R -e 'install.packages("x")'`,
      "    # Unknown source for y"
    ]);
  });

  it("points R at the mirror and installs only the helpers the commands call", () => {
    const repositories = { cranRepo: "https://cran.example.org", timeoutSeconds: 120 };
    expect(postSetupLines(repositories, ['BiocManager::install("DESeq2")', 'install.packages("x")'])).toEqual([
      `    echo 'options(repos = c(CRAN = "https://cran.example.org"), timeout = 120)' >> "$(R RHOME)/etc/Rprofile.site"`,
      `    R -e 'if (!requireNamespace("BiocManager", quietly = TRUE)) install.packages("BiocManager")'`
    ]);
    expect(postSetupLines(repositories, ['install.packages("x")'])).toHaveLength(1);
  });
});

describe("ReproducibilityGenerator", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await removeProjectDir(dir);
    dir = "";
  });

  async function projectWithDplyr() {
    dir = await makeProjectDir();
    const t = makeTestTracker(dir);
    await writePackage(t.config.libPath, "dplyr", { Version: "1.1.4", Repository: "CRAN" });
    await writePackage(t.config.libPath, "rlang", { Version: "1.1.3", Repository: "CRAN" });
    await t.tracker.installer.installCran(["dplyr"]);
    return t;
  }

  it("writes an executable install script", async () => {
    const { tracker, output } = await projectWithDplyr();
    const script = await tracker.generator.generateInstallScript();

    expect(script.path).toBe(path.join(dir, "install_r_packages.R"));
    const text = await fs.readFile(path.join(dir, "install_r_packages.R"), "utf8");
    expect(text).toBe(
      [
        "#!/usr/bin/env Rscript",
        "# R Package Installation Script",
        "# Generated: 2024-03-05 14:07:10",
        "# R version: 4.3.2",
        "",
        "# Set CRAN mirror",
        'options(repos = c(CRAN = "https://cloud.r-project.org"), timeout = 600)',
        "",
        "# Set library path",
        'lib_path <- "R_libs"',
        "if (!dir.exists(lib_path)) dir.create(lib_path, recursive = TRUE)",
        ".libPaths(c(lib_path, .libPaths()))",
        "",
        "# Installer helpers",
        'if (!requireNamespace("remotes", quietly = TRUE)) install.packages("remotes", lib = lib_path)',
        "",
        "# Install packages",
        'remotes::install_version("dplyr", version = "1.1.4")',
        ""
      ].join("\n")
    );
    expect((await fs.stat(path.join(dir, "install_r_packages.R"))).mode & 0o777).toBe(0o755);
    expect(output.entries().slice(-2)).toEqual([`Install script saved: ${script.path ?? ""}`, "   Commands: 1"]);
  });

  it("writes a standalone container script that sets the mirror and bootstraps helpers", async () => {
    const { tracker, config } = await projectWithDplyr();
    await writePackage(config.libPath, "DESeq2", { Version: "1.42.0", Repository: "BioCsoft" });
    await fs.writeFile(config.rhistoryPath, 'BiocManager::install("DESeq2")\n', "utf8");

    const script = await tracker.generator.generateContainerInstallScript({ outputPath: null });
    expect(script.text.split("\n").slice(8)).toEqual([
      "cat('Installing packages...\\n')",
      "",
      'options(repos = c(CRAN = "https://cloud.r-project.org"), timeout = 600)',
      'if (!requireNamespace("BiocManager", quietly = TRUE)) install.packages("BiocManager")',
      "",
      'BiocManager::install("DESeq2")',
      'install.packages("dplyr")',
      "",
      "cat('Installation complete!\\n')"
    ]);
  });

  it("returns the script without writing when no output path is wanted", async () => {
    const { tracker } = await projectWithDplyr();
    const script = await tracker.generator.generateInstallScript({ outputPath: null, includeDependencies: true });
    expect(script.path).toBeNull();
    expect(script.commands).toEqual([
      'remotes::install_version("dplyr", version = "1.1.4")',
      'remotes::install_version("rlang", version = "1.1.3")'
    ]);
    await expect(fs.access(path.join(dir, "install_r_packages.R"))).rejects.toThrow();
  });

  it("renders %post lines and a full definition file for containers", async () => {
    const { tracker } = await projectWithDplyr();

    const post = await tracker.generator.generateContainerInstallScript({ format: "container_post", outputPath: null });
    expect(post.text.split("\n")).toEqual([
      "# Add these lines to your container definition %post section",
      "# Generated: 2024-03-05 14:07:10",
      "# Based on R version: 4.3.2",
      "",
      "# Repository and installer helpers",
      `    echo 'options(repos = c(CRAN = "https://cloud.r-project.org"), timeout = 600)' >> "$(R RHOME)/etc/Rprofile.site"`,
      "",
      "# Package installations",
      `    R -e 'install.packages("dplyr")'`
    ]);

    const def = await tracker.generator.generateContainerInstallScript({ format: "definition", includeDependencies: true });
    expect(def.path).toBe(path.join(dir, "r-environment.def"));
    expect(def.text.split("\n")).toEqual([
      "Bootstrap: docker",
      "From: rocker/r-ver:4.3.2",
      "",
      "%labels",
      "    Generated 2024-03-05 14:07:11",
      "    RVersion 4.3.2",
      "",
      "%environment",
      "    export R_LIBS_USER=/project/R_libs",
      "",
      "%post",
      `    echo 'options(repos = c(CRAN = "https://cloud.r-project.org"), timeout = 600)' >> "$(R RHOME)/etc/Rprofile.site"`,
      `    R -e 'if (!requireNamespace("remotes", quietly = TRUE)) install.packages("remotes")'`,
      `    R -e 'install.packages("dplyr")'`,
      `    R -e 'remotes::install_version("rlang", version = "1.1.3")'`
    ]);
  });

  it("produces reports that differ only in their generation time", async () => {
    const { tracker } = await projectWithDplyr();
    const first = await tracker.generator.generateReport("reports/a.json");
    const second = await tracker.generator.generateReport("reports/b.json");

    const read = async (p: string): Promise<Record<string, unknown>> => {
      const parsed: unknown = JSON.parse(await fs.readFile(p, "utf8"));
      if (typeof parsed !== "object" || parsed === null) throw new Error("report is not an object");
      return Object.fromEntries(Object.entries(parsed).filter(([k]) => k !== "generated_at"));
    };

    expect(first.path).toBe(path.join(dir, "reports", "a.json"));
    expect(await read(first.path)).toEqual(await read(second.path));
    expect(first.report.generatedAt).not.toBe(second.report.generatedAt);
    expect(first.report.libraryFingerprint).toBe(second.report.libraryFingerprint);
    expect(first.report.manuallyInstalledCount).toBe(1);
    expect(first.report.dependenciesCount).toBe(1);
  });

  it("names the default report after the generation time", async () => {
    dir = await makeProjectDir();
    const { tracker } = makeTestTracker(dir);
    const { path: reportPath, report } = await tracker.generator.generateReport();
    expect(reportPath).toBe(path.join(dir, "r_reproducibility_report_20240305_140709.json"));
    expect(report.totalPackages).toBe(0);
  });

  it("runs the full workflow", async () => {
    const { tracker, output } = await projectWithDplyr();
    const analyze = vi.spyOn(tracker.analyzer, "analyze");
    const { analysis, reportPath, scriptPath } = await tracker.generator.generateFullReproducibility();

    expect(analyze).toHaveBeenCalledTimes(1);
    const report: unknown = JSON.parse(await fs.readFile(reportPath, "utf8"));
    expect(report).toEqual(
      expect.objectContaining({ total_packages: analysis.summary.totalPackages, manually_installed_count: 1 })
    );

    expect(reportPath).toBe(path.join(dir, "r_reproducibility_report_20240305_140710.json"));
    expect(scriptPath).toBe(path.join(dir, "install_r_packages.R"));
    await expect(fs.access(reportPath)).resolves.toBeUndefined();
    expect(output.entries()[output.entries().length - 1]).toBe(
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
  });
});
