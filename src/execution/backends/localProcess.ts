import type { ExecutionResources, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";
import { spawnCaptured } from "./capture.js";

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");

    return spawnCaptured(command, args, { cwd: spec.cwd, runtimeSeconds: resources.runtimeSeconds });
  }
}
