import { PackageAnalyzer } from "./analysis/packageAnalyzer.js";
import type { Clock } from "./core/clock.js";
import type { SessionOutput } from "./core/sessionOutput.js";
import { loadTrackerConfig, type TrackerConfig } from "./config/trackerConfig.js";
import { RSession, type RuntimeInfo } from "./execution/rSession.js";
import { HistoryViewer } from "./history/historyViewer.js";
import { PackageInstaller } from "./install/installer.js";
import { ReproducibilityGenerator } from "./reproduce/reproducibilityGenerator.js";
import { InstallLogStore } from "./store/installLog.js";

export interface TrackerDeps {
  config: TrackerConfig;
  runtime: RuntimeInfo;
  session: RSession;
  output: SessionOutput;
  clock?: Clock;
}

export interface Tracker {
  config: TrackerConfig;
  runtime: RuntimeInfo;
  log: InstallLogStore;
  installer: PackageInstaller;
  history: HistoryViewer;
  analyzer: PackageAnalyzer;
  generator: ReproducibilityGenerator;
}

/** Wires every component against one configuration and one output sink. */
export function createTracker(deps: TrackerDeps): Tracker {
  const { config, runtime, session, output, clock } = deps;
  const log = new InstallLogStore({ jsonPath: config.historyJsonPath, textPath: config.historyTextPath, output });
  const analyzer = new PackageAnalyzer({ config, runtime, log, output });
  return {
    config,
    runtime,
    log,
    installer: new PackageInstaller({ config, runtime, session, log, output, clock }),
    history: new HistoryViewer({ log, output }),
    analyzer,
    generator: new ReproducibilityGenerator({ config, runtime, analyzer, log, output, clock })
  };
}

/** Loads the configuration and settles the R version/platform once for the session. */
export async function bootstrapSession(
  configPath: string,
  output: SessionOutput
): Promise<{ config: TrackerConfig; runtime: RuntimeInfo; session: RSession }> {
  const config = await loadTrackerConfig(configPath);
  const session = new RSession({ config });
  let runtime: RuntimeInfo;
  try {
    runtime = await session.detectRuntime();
  } catch (e) {
    output.message(`Could not determine the R version: ${e instanceof Error ? e.message : String(e)}`);
    runtime = { rVersion: config.runtime.rVersion ?? "unknown", platform: config.runtime.platform ?? "unknown" };
  }
  return { config, runtime, session };
}
