import { createHash } from "crypto";
import type { JsonValue } from "./json.js";

export function sha256Prefixed(data: string): `sha256:${string}` {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Object keys sorted at every depth; undefined members are dropped, and become null inside arrays. */
function sortedJson(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((v) => sortedJson(v) ?? null);
  if (typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value);
    const out: { [key: string]: JsonValue } = {};
    for (const [key, member] of entries.sort(byKey)) {
      const sorted = sortedJson(member);
      if (sorted !== undefined) out[key] = sorted;
    }
    return out;
  }
  throw new Error(`value is not JSON-serializable: ${typeof value}`);
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(sortedJson(value) ?? null);
}

// The on-disk form of the log and the report.
export function stablePrettyJson(value: unknown): string {
  return JSON.stringify(sortedJson(value) ?? null, null, 2) + "\n";
}
