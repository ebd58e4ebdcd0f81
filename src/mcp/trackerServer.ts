import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { checkLibraries } from "../analysis/summary.js";
import { toAnalysisSummary, toPackageMap } from "../analysis/packageAnalyzer.js";
import type { Clock } from "../core/clock.js";
import type { JsonObject } from "../core/json.js";
import { BufferedOutput } from "../core/sessionOutput.js";
import type { TrackerConfig } from "../config/trackerConfig.js";
import type { RSession, RuntimeInfo } from "../execution/rSession.js";
import type { GeneratedScript } from "../reproduce/reproducibilityGenerator.js";
import { toLoggedRecord } from "../store/installLog.js";
import { createTracker, type Tracker } from "../tracker.js";
import { projectPath } from "./projectPaths.js";
import {
  zContainerScriptInput,
  zGeneratedScriptOutput,
  zInstallHistoryInput,
  zInstallHistoryOutput,
  zInstallScriptInput,
  zLibraryCheckInput,
  zLibraryCheckOutput,
  zPackageAnalyzeInput,
  zPackageAnalyzeOutput,
  zPackageInstallInput,
  zPackageInstallOutput,
  zReproducibilityFullInput,
  zReproducibilityFullOutput,
  zReproducibilityReportInput,
  zReproducibilityReportOutput
} from "./toolSchemas.js";

export interface TrackerServerDeps {
  config: TrackerConfig;
  runtime: RuntimeInfo;
  session: RSession;
  clock?: Clock;
}

interface ToolOutcome {
  summary: string;
  result: JsonObject;
}

function scriptResult(script: GeneratedScript): JsonObject {
  return {
    path: script.path,
    command_count: script.commands.length,
    commands: script.commands,
    script: script.text
  };
}

export function createTrackerServer(deps: TrackerServerDeps): McpServer {
  const mcp = new McpServer({
    name: "rpkg-tracker",
    version: "0.1.0"
  });

  // stdout belongs to the protocol, so every call gets its own buffered session output.
  async function runWithTracker(fn: (tracker: Tracker) => Promise<ToolOutcome>): Promise<CallToolResult> {
    const output = new BufferedOutput();
    const tracker = createTracker({ ...deps, output });
    const { summary, result } = await fn(tracker);
    const transcript = output.text();
    return {
      content: [{ type: "text", text: transcript ? `${summary}\n\n${transcript}` : summary }],
      structuredContent: result
    };
  }

  const inProject = (p: string): string => projectPath(deps.config.projectDir, p);

  mcp.registerTool(
    "package_install",
    {
      description: "Install R packages from CRAN, Bioconductor, GitHub, GitLab or Bitbucket into the project library and log the attempt.",
      inputSchema: zPackageInstallInput,
      outputSchema: zPackageInstallOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const record = await tracker.installer.install(args.packages, args.method, args.extra_options ?? {});
        return {
          summary: `${record.success ? "Installed" : "Failed to install"} ${record.packages.join(", ")} (${record.method})`,
          result: { record: toLoggedRecord(record) }
        };
      })
  );

  mcp.registerTool(
    "install_history",
    {
      description: "Show logged install attempts, optionally filtered by method and limited to the most recent N.",
      inputSchema: zInstallHistoryInput,
      outputSchema: zInstallHistoryOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const records = await tracker.history.show({ recent: args.recent ?? null, method: args.method ?? null });
        return {
          summary: `${records.length} install record(s)`,
          result: { record_count: records.length, records: records.map(toLoggedRecord) }
        };
      })
  );

  mcp.registerTool(
    "package_analyze",
    {
      description: "Classify every package in the library as manually installed or dependency and derive reinstall commands.",
      inputSchema: zPackageAnalyzeInput,
      outputSchema: zPackageAnalyzeOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const analysis = await tracker.analyzer.analyze({
          libPath: args.lib_path ? inProject(args.lib_path) : undefined,
          rhistoryPath: args.rhistory_path ? inProject(args.rhistory_path) : undefined
        });
        const s = analysis.summary;
        return {
          summary: `${s.totalPackages} package(s): ${s.manuallyInstalledCount} manual, ${s.dependenciesCount} dependencies`,
          result: {
            summary: toAnalysisSummary(s),
            manually_installed: toPackageMap(analysis.manuallyInstalled),
            dependencies: toPackageMap(analysis.dependencies)
          }
        };
      })
  );

  mcp.registerTool(
    "library_check",
    {
      description: "List the R library directories present in the project and their package counts.",
      inputSchema: zLibraryCheckInput,
      outputSchema: zLibraryCheckOutput
    },
    async () => {
      const output = new BufferedOutput();
      const libraries = await checkLibraries(deps.config.projectDir, output, deps.runtime.rVersion);
      return {
        content: [{ type: "text", text: output.text() }],
        structuredContent: {
          libraries: libraries.map((l) => ({ name: l.name, path: l.path, package_count: l.packageCount }))
        }
      };
    }
  );

  mcp.registerTool(
    "reproducibility_report",
    {
      description: "Write a JSON snapshot of the install log and the analysed library.",
      inputSchema: zReproducibilityReportInput,
      outputSchema: zReproducibilityReportOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const { path, report } = await tracker.generator.generateReport(
          args.output_path ? inProject(args.output_path) : null
        );
        return {
          summary: `Report written to ${path}`,
          result: {
            path,
            generated_at: report.generatedAt,
            total_packages: report.totalPackages,
            manually_installed_count: report.manuallyInstalledCount,
            dependencies_count: report.dependenciesCount,
            library_fingerprint: report.libraryFingerprint
          }
        };
      })
  );

  mcp.registerTool(
    "install_script_generate",
    {
      description: "Generate an Rscript that reinstalls the manually installed packages (optionally their dependencies).",
      inputSchema: zInstallScriptInput,
      outputSchema: zGeneratedScriptOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const script = await tracker.generator.generateInstallScript({
          preferPinned: args.prefer_pinned,
          includeDependencies: args.include_dependencies,
          outputPath: args.output_path === undefined ? undefined : args.output_path === null ? null : inProject(args.output_path)
        });
        return { summary: `${script.commands.length} install command(s)`, result: scriptResult(script) };
      })
  );

  mcp.registerTool(
    "container_script_generate",
    {
      description: "Generate plain R install commands for a container build: a standalone script, %post lines, or a full definition file.",
      inputSchema: zContainerScriptInput,
      outputSchema: zGeneratedScriptOutput
    },
    async (args) =>
      runWithTracker(async (tracker) => {
        const script = await tracker.generator.generateContainerInstallScript({
          includeDependencies: args.include_dependencies,
          format: args.format,
          outputPath: args.output_path === undefined ? undefined : args.output_path === null ? null : inProject(args.output_path)
        });
        return { summary: `${script.commands.length} container install command(s)`, result: scriptResult(script) };
      })
  );

  mcp.registerTool(
    "reproducibility_full",
    {
      description: "Analyse the library, write the report and the install script, and summarise.",
      inputSchema: zReproducibilityFullInput,
      outputSchema: zReproducibilityFullOutput
    },
    async () =>
      runWithTracker(async (tracker) => {
        const { analysis, reportPath, scriptPath } = await tracker.generator.generateFullReproducibility();
        return {
          summary: "Reproducibility package complete",
          result: { report_path: reportPath, script_path: scriptPath, summary: toAnalysisSummary(analysis.summary) }
        };
      })
  );

  return mcp;
}
