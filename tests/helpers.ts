import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { resolveTrackerConfig, type TrackerConfig } from "../src/config/trackerConfig.js";
import type { Clock } from "../src/core/clock.js";
import { BufferedOutput } from "../src/core/sessionOutput.js";
import type { ExecutionResult, LocalProcessSpec, RunnerBackend } from "../src/execution/backends/types.js";
import { RSession, type RuntimeInfo } from "../src/execution/rSession.js";
import { createTracker, type Tracker } from "../src/tracker.js";

export const TEST_RUNTIME: RuntimeInfo = { rVersion: "4.3.2", platform: "x86_64-pc-linux-gnu" };

export type ScriptedOutcome = { exitCode: number; stdout?: string; stderr?: string };

/** Records every R expression and answers from a script of outcomes (success when the script runs out). */
export class FakeRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;
  readonly specs: LocalProcessSpec[] = [];
  private readonly outcomes: ScriptedOutcome[];

  constructor(outcomes: ScriptedOutcome[] = []) {
    this.outcomes = [...outcomes];
  }

  get expressions(): string[] {
    return this.specs.map((s) => s.argv[s.argv.length - 1] ?? "");
  }

  async execute(spec: LocalProcessSpec): Promise<ExecutionResult> {
    this.specs.push(spec);
    const next = this.outcomes.shift() ?? { exitCode: 0 };
    return { exitCode: next.exitCode, stdout: next.stdout ?? "", stderr: next.stderr ?? "", timedOut: false };
  }
}

/** 2024-03-05 14:07:09 local time, advancing one second per call. */
export function fixedClock(): Clock {
  let tick = 0;
  return () => new Date(2024, 2, 5, 14, 7, 9 + tick++);
}

export async function makeProjectDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "rpkg_tracker_test_"));
}

export async function removeProjectDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(projectDir: string): TrackerConfig {
  return resolveTrackerConfig(
    { version: 1, runtime: { r_version: TEST_RUNTIME.rVersion, platform: TEST_RUNTIME.platform } },
    { projectDir }
  );
}

export interface TestTracker {
  tracker: Tracker;
  runner: FakeRunner;
  output: BufferedOutput;
  session: RSession;
  config: TrackerConfig;
}

export function makeTestTracker(projectDir: string, outcomes: ScriptedOutcome[] = []): TestTracker {
  const config = testConfig(projectDir);
  const runner = new FakeRunner(outcomes);
  const session = new RSession({ config, local: runner });
  const output = new BufferedOutput();
  const tracker = createTracker({ config, runtime: TEST_RUNTIME, session, output, clock: fixedClock() });
  return { tracker, runner, output, session, config };
}

/** Writes `<lib>/<name>/DESCRIPTION` with the given fields. */
export async function writePackage(libPath: string, name: string, fields: Record<string, string>): Promise<void> {
  const dir = path.join(libPath, name);
  await fs.mkdir(dir, { recursive: true });
  const body = Object.entries({ Package: name, ...fields })
    .map(([k, v]) => `${k}: ${v}`)
    .join("\n");
  await fs.writeFile(path.join(dir, "DESCRIPTION"), `${body}\n`, "utf8");
}
