import type { ApptainerSpec, ExecutionResources, ExecutionResult, RunnerBackend } from "./types.js";
import { spawnCaptured } from "./capture.js";

export function apptainerArgs(spec: ApptainerSpec): string[] {
  if (!spec.image) throw new Error("apptainer image must be non-empty");
  if (!spec.argv.length) throw new Error("apptainer argv must be non-empty");

  const args: string[] = ["exec"];
  for (const b of spec.binds) {
    args.push("--bind", `${b.hostPath}:${b.containerPath}${b.readOnly ? ":ro" : ""}`);
  }
  if (spec.pwd) {
    args.push("--pwd", spec.pwd);
  }
  args.push(spec.image, ...spec.argv);
  return args;
}

/** Runs a command inside an Apptainer/Singularity image, the way the project launcher starts R. */
export class ApptainerRunner implements RunnerBackend<"apptainer"> {
  readonly kind = "apptainer" as const;

  async execute(spec: ApptainerSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    return spawnCaptured(spec.binary, apptainerArgs(spec), { runtimeSeconds: resources.runtimeSeconds });
  }
}
