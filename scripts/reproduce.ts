import { checkLibraries, printPackageSummary } from "../src/analysis/summary.js";
import { consoleOutput } from "../src/core/sessionOutput.js";
import type { ContainerScriptFormat } from "../src/reproduce/scriptRender.js";
import { createTracker, bootstrapSession } from "../src/tracker.js";

const MODES = ["full", "report", "script", "container", "history", "check"] as const;
type Mode = (typeof MODES)[number];

const FORMATS = ["script", "container_post", "definition"] as const;

const FLAGS = new Set(["help", "include-dependencies", "actual-commands"]);

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/reproduce.ts [--mode full|report|script|container|history|check] [--out <path>]",
    "                           [--format script|container_post|definition] [--include-dependencies]",
    "                           [--actual-commands] [--recent <n>] [--method <m>]",
    "",
    "env:",
    "  TRACKER_CONFIG_PATH (optional, default config/default.tracker.yaml)",
    "  TRACKER_PROJECT_DIR (optional, project directory referenced by the default config)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, flag: string): T {
  const hit = allowed.find((v) => v === value);
  if (hit === undefined) throw new Error(`invalid --${flag}: ${value}`);
  return hit;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const mode: Mode = typeof args.mode === "string" ? oneOf(MODES, args.mode, "mode") : "full";
  const format: ContainerScriptFormat = typeof args.format === "string" ? oneOf(FORMATS, args.format, "format") : "script";
  const outPath = typeof args.out === "string" ? args.out : undefined;
  const includeDependencies = Boolean(args["include-dependencies"]);

  let recent: number | null = null;
  if (typeof args.recent === "string") {
    if (!/^[0-9]+$/.test(args.recent)) throw new Error(`invalid --recent: ${args.recent}`);
    recent = Number(args.recent);
  }
  const method = typeof args.method === "string" ? args.method : null;

  const configPath = process.env.TRACKER_CONFIG_PATH ?? "config/default.tracker.yaml";
  const { config, runtime, session } = await bootstrapSession(configPath, consoleOutput);
  const tracker = createTracker({ config, runtime, session, output: consoleOutput });

  switch (mode) {
    case "full":
      await tracker.generator.generateFullReproducibility();
      return;
    case "report":
      await tracker.generator.generateReport(outPath);
      return;
    case "script": {
      const analysis = await tracker.analyzer.analyze();
      printPackageSummary(analysis, consoleOutput);
      await tracker.generator.generateInstallScript({
        analysis,
        preferPinned: !args["actual-commands"],
        includeDependencies,
        outputPath: outPath
      });
      return;
    }
    case "container":
      await tracker.generator.generateContainerInstallScript({ includeDependencies, format, outputPath: outPath });
      return;
    case "history":
      await tracker.history.show({ recent, method });
      return;
    case "check":
      await checkLibraries(config.projectDir, consoleOutput, runtime.rVersion);
      return;
    default: {
      const exhaustive: never = mode;
      throw new Error(`unhandled mode: ${String(exhaustive)}`);
    }
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
