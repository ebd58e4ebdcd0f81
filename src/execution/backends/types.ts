export interface ExecutionResources {
  runtimeSeconds: number;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd?: string;
}

export interface ApptainerBind {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export interface ApptainerSpec {
  kind: "apptainer";
  binary: string;
  image: string;
  argv: string[];
  binds: ApptainerBind[];
  pwd?: string;
}

export type ExecutionSpec = LocalProcessSpec | ApptainerSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, resources: ExecutionResources): Promise<ExecutionResult>;
}
