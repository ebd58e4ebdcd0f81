import type { TrackerConfig } from "../config/trackerConfig.js";
import { ApptainerRunner } from "./backends/apptainerRunner.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { ExecutionResult, ExecutionSpec, RunnerBackend } from "./backends/types.js";

export interface RuntimeInfo {
  rVersion: string;
  platform: string;
}

export class RExecutionError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(message);
    this.name = "RExecutionError";
  }
}

/**
 * Pulls the R condition message out of Rscript's stderr: everything from the
 * first `Error` line on, minus the trailing "Execution halted".
 */
export function rErrorMessage(stderr: string, exitCode: number): string {
  const lines = stderr
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && l !== "Execution halted");
  const start = lines.findIndex((l) => l.startsWith("Error"));
  const relevant = start >= 0 ? lines.slice(start) : lines.slice(-3);
  const text = relevant.join(" ").trim();
  return text.length > 0 ? text : `Rscript exited with status ${exitCode}`;
}

const RUNTIME_INFO_EXPR = 'cat(paste(R.version$major, R.version$minor, sep = "."), R.version$platform, sep = "\\n")';

export class RSession {
  private readonly local: RunnerBackend<"local_process">;
  private readonly apptainer: RunnerBackend<"apptainer">;

  constructor(
    private readonly deps: {
      config: TrackerConfig;
      local?: RunnerBackend<"local_process">;
      apptainer?: RunnerBackend<"apptainer">;
    }
  ) {
    this.local = deps.local ?? new LocalProcessRunner();
    this.apptainer = deps.apptainer ?? new ApptainerRunner();
  }

  buildSpec(expression: string): ExecutionSpec {
    const { config } = this.deps;
    const argv = [config.runtime.rscript, "--vanilla", "-e", expression];

    if (config.runtime.backend === "local_process") {
      return { kind: "local_process", argv, cwd: config.projectDir };
    }

    const image = config.runtime.apptainer.image;
    if (!image) throw new Error("runtime.apptainer.image is not configured");
    const binds = [
      { hostPath: config.projectDir, containerPath: config.projectDir },
      ...config.runtime.apptainer.binds.map((b) => {
        const [hostPath = b, containerPath = hostPath, mode] = b.split(":");
        return { hostPath, containerPath, readOnly: mode === "ro" };
      })
    ];
    return { kind: "apptainer", binary: config.runtime.apptainer.binary, image, argv, binds, pwd: config.projectDir };
  }

  async run(expression: string): Promise<ExecutionResult> {
    const spec = this.buildSpec(expression);
    const resources = { runtimeSeconds: this.deps.config.maxRuntimeSeconds };
    const result =
      spec.kind === "local_process"
        ? await this.local.execute(spec, resources)
        : await this.apptainer.execute(spec, resources);

    if (result.timedOut) {
      throw new RExecutionError(
        `R process exceeded max_runtime_seconds=${this.deps.config.maxRuntimeSeconds}`,
        result.exitCode,
        result.stderr
      );
    }
    if (result.exitCode !== 0) {
      throw new RExecutionError(rErrorMessage(result.stderr, result.exitCode), result.exitCode, result.stderr);
    }
    return result;
  }

  /** Configured overrides win; otherwise asks R once. */
  async detectRuntime(): Promise<RuntimeInfo> {
    const { rVersion, platform } = this.deps.config.runtime;
    if (rVersion && platform) return { rVersion, platform };

    const result = await this.run(RUNTIME_INFO_EXPR);
    const [detectedVersion = "", detectedPlatform = ""] = result.stdout.split(/\r?\n/).map((l) => l.trim());
    return {
      rVersion: rVersion ?? (detectedVersion || "unknown"),
      platform: platform ?? (detectedPlatform || "unknown")
    };
  }
}
