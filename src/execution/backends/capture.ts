import { spawn } from "child_process";
import type { ExecutionResult } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CaptureState {
  bytes: number;
  truncated: boolean;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: CaptureState): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

/** Spawns `command`, captures both streams up to 1 MiB each and kills it after `runtimeSeconds`. */
export async function spawnCaptured(
  command: string,
  args: string[],
  opts: { cwd?: string; runtimeSeconds: number }
): Promise<ExecutionResult> {
  const child = spawn(command, args, {
    cwd: opts.cwd,
    stdio: ["ignore", "pipe", "pipe"] as const
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  const stdoutState: CaptureState = { bytes: 0, truncated: false };
  const stderrState: CaptureState = { bytes: 0, truncated: false };

  child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
  child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

  let timedOut = false;
  const timeoutMs = Math.max(0, Math.floor(opts.runtimeSeconds * 1000));
  const timeout =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, timeoutMs)
      : null;

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null) => resolve(code ?? (timedOut ? 137 : 0)));
  }).finally(() => {
    if (timeout) clearTimeout(timeout);
  });

  const stdout =
    Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
  const stderr =
    Buffer.concat(stderrChunks).toString("utf8") +
    (stderrState.truncated ? "\n[stderr truncated]\n" : "") +
    (timedOut ? "\n[timeout]\n" : "");

  return { exitCode, stdout, stderr, timedOut };
}
