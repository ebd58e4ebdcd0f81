import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { stablePrettyJson } from "../core/canonicalJson.js";
import { displayTimestamp } from "../core/clock.js";
import { isNotFound } from "../core/fsErrors.js";
import { isInstallRecordId } from "../core/ids.js";
import { statusGlyph, type InstallRecord } from "../core/installRecord.js";
import type { JsonObject } from "../core/json.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import { INSTALL_METHODS } from "../sources/installSources.js";

// Older logs were written with scalar unboxing: a single package is a bare string,
// and a missing output an empty object. A deparsed call longer than one line is an array of lines.
const zCommandText = z.union([z.string(), z.array(z.string())]);

const zLoggedRecord = z.object({
  record_id: z.string().nullable().optional(),
  timestamp: z.string(),
  packages: z.union([z.string(), z.array(z.string())]),
  method: z.enum(INSTALL_METHODS),
  r_version: z.string().optional(),
  platform: z.string().optional(),
  command: zCommandText.optional(),
  actual_command: zCommandText.nullable().optional(),
  success: z.boolean(),
  output: z.unknown().optional()
});

type LoggedRecord = z.infer<typeof zLoggedRecord>;

function commandText(value: string | string[]): string {
  return typeof value === "string" ? value : value.join("\n");
}

function fromLogged(entry: LoggedRecord): InstallRecord {
  const recordId = entry.record_id && isInstallRecordId(entry.record_id) ? entry.record_id : null;
  return {
    recordId,
    timestamp: entry.timestamp,
    packages: typeof entry.packages === "string" ? [entry.packages] : entry.packages,
    method: entry.method,
    rVersion: entry.r_version ?? "unknown",
    platform: entry.platform ?? "unknown",
    command: entry.command === undefined ? "" : commandText(entry.command),
    actualCommand: entry.actual_command === undefined || entry.actual_command === null ? null : commandText(entry.actual_command),
    success: entry.success,
    output: typeof entry.output === "string" ? entry.output : null
  };
}

export function toLoggedRecord(record: InstallRecord): JsonObject {
  return {
    record_id: record.recordId,
    timestamp: record.timestamp,
    packages: record.packages,
    method: record.method,
    r_version: record.rVersion,
    platform: record.platform,
    command: record.command,
    actual_command: record.actualCommand,
    success: record.success,
    output: record.output
  };
}

export function formatTextLogEntry(record: InstallRecord): string {
  return [
    `[${displayTimestamp(record.timestamp)}] ${statusGlyph(record.success)} ${record.method}`,
    `  Packages: ${record.packages.join(", ")}`,
    `  Method: ${record.method}`,
    `  Command: ${record.actualCommand ?? record.command}`,
    "",
    ""
  ].join("\n");
}

/**
 * The install history: a JSON array rewritten in full on every append, plus a
 * text file that is only ever appended to. No locking; the last writer wins.
 */
export class InstallLogStore {
  constructor(
    private readonly deps: {
      jsonPath: string;
      textPath: string;
      output: SessionOutput;
    }
  ) {}

  get jsonPath(): string {
    return this.deps.jsonPath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.deps.jsonPath);
      return true;
    } catch {
      return false;
    }
  }

  private async readEntries(): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.deps.jsonPath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.deps.output.message(`Install log is not valid JSON, treating it as empty: ${this.deps.jsonPath}`);
      return [];
    }
    if (!Array.isArray(parsed)) {
      this.deps.output.message(`Install log is not a JSON array, treating it as empty: ${this.deps.jsonPath}`);
      return [];
    }
    return parsed;
  }

  async readAll(): Promise<InstallRecord[]> {
    const entries = await this.readEntries();
    const records: InstallRecord[] = [];
    entries.forEach((entry, index) => {
      const res = zLoggedRecord.safeParse(entry);
      if (res.success) {
        records.push(fromLogged(res.data));
      } else {
        this.deps.output.message(`Skipping malformed install log entry #${index + 1} in ${this.deps.jsonPath}`);
      }
    });
    return records;
  }

  async append(record: InstallRecord): Promise<void> {
    // Entries we cannot parse are carried over untouched.
    const entries = await this.readEntries();
    entries.push(toLoggedRecord(record));

    await fs.mkdir(path.dirname(this.deps.jsonPath), { recursive: true });
    await fs.writeFile(this.deps.jsonPath, stablePrettyJson(entries), "utf8");
    await fs.appendFile(this.deps.textPath, formatTextLogEntry(record), "utf8");

    this.deps.output.message("Installation logged");
  }
}
