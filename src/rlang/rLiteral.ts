export type RScalar = string | number | boolean | null;
export type RArgValue = RScalar | readonly string[];

export function rString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}

export function rCharacterVector(values: readonly string[]): string {
  return `c(${values.map(rString).join(", ")})`;
}

/** A single string stays scalar; several become `c(...)`. */
export function rStringOrVector(values: readonly string[]): string {
  const [only] = values;
  if (values.length === 1 && only !== undefined) return rString(only);
  return rCharacterVector(values);
}

export function rValue(value: RArgValue): string {
  if (value === null) return "NULL";
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error(`cannot render non-finite number as R literal: ${value}`);
    return String(value);
  }
  if (typeof value === "string") return rString(value);
  return rCharacterVector(value);
}

const R_NAME_RE = /^[A-Za-z.][A-Za-z0-9._]*$/;

export function assertRArgName(name: string): void {
  if (!R_NAME_RE.test(name)) {
    throw new Error(`invalid R argument name: ${name}`);
  }
}

/** Renders `name = value` pairs in key order, for deterministic commands. */
export function rNamedArgs(args: Record<string, RArgValue>): string[] {
  return Object.keys(args)
    .sort()
    .map((name) => {
      assertRArgName(name);
      const value = args[name];
      if (value === undefined) throw new Error(`missing value for R argument: ${name}`);
      return `${name} = ${rValue(value)}`;
    });
}

export function rCall(fn: string, positional: string[], named: string[] = []): string {
  return `${fn}(${[...positional, ...named].join(", ")})`;
}
