import { displayTimestamp } from "../core/clock.js";
import { statusGlyph, type InstallRecord } from "../core/installRecord.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import type { InstallLogStore } from "../store/installLog.js";

export interface HistoryFilter {
  recent?: number | null;
  method?: string | null;
}

const ERROR_EXCERPT_CHARS = 100;

/** Method first (exact match), then the last `recent` of what is left, in log order. */
export function filterHistory(records: readonly InstallRecord[], filter: HistoryFilter): InstallRecord[] {
  let out = [...records];
  const method = filter.method ?? null;
  if (method !== null) {
    out = out.filter((r) => r.method === method);
  }
  const recent = filter.recent ?? null;
  if (recent !== null && out.length > recent) {
    out = recent > 0 ? out.slice(-recent) : [];
  }
  return out;
}

export function renderHistory(records: readonly InstallRecord[]): string {
  const lines: string[] = ["", "R Package Installation History", "=".repeat(50), ""];
  for (const r of records) {
    lines.push(`${statusGlyph(r.success)} ${displayTimestamp(r.timestamp)}`);
    lines.push(`   Method: ${r.method}`);
    lines.push(`   Packages: ${r.packages.join(", ")}`);
    if (r.actualCommand !== null) {
      lines.push(`   Command: ${r.actualCommand}`);
    }
    if (!r.success && r.output !== null) {
      lines.push(`   Error: ${r.output.slice(0, ERROR_EXCERPT_CHARS)}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

export class HistoryViewer {
  constructor(
    private readonly deps: {
      log: InstallLogStore;
      output: SessionOutput;
    }
  ) {}

  async show(filter: HistoryFilter = {}): Promise<InstallRecord[]> {
    if (!(await this.deps.log.exists())) {
      this.deps.output.message("No installation history found");
      return [];
    }
    const records = filterHistory(await this.deps.log.readAll(), filter);
    this.deps.output.print(renderHistory(records));
    return records;
  }
}
