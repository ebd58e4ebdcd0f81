import { promises as fs } from "fs";
import { isNotFound } from "../core/fsErrors.js";

export type DescriptorFields = Record<string, string>;

/**
 * Parses the first stanza of a DESCRIPTION file (Debian control format):
 * `Field: value` lines, with indented lines continuing the previous field.
 */
export function parseDescriptor(text: string): DescriptorFields {
  const fields: DescriptorFields = {};
  let current: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0) {
      if (Object.keys(fields).length > 0) break;
      continue;
    }

    if (/^\s/.test(line)) {
      if (current === null) continue;
      const continued = line.trim();
      fields[current] = fields[current] ? `${fields[current]} ${continued}` : continued;
      continue;
    }

    const m = /^([^\s:]+):\s*(.*)$/.exec(line);
    if (!m || !m[1]) {
      current = null;
      continue;
    }
    current = m[1];
    fields[current] = (m[2] ?? "").trim();
  }

  return fields;
}

export async function readDescriptor(filePath: string): Promise<DescriptorFields | null> {
  try {
    return parseDescriptor(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export function field(fields: DescriptorFields, key: string): string | null {
  const v = fields[key]?.trim();
  return v ? v : null;
}
