export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time, as shown in the text log and history view. */
export function formatTimestamp(date: Date): string {
  const d = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const t = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${d} ${t}`;
}

/** `YYYYMMDD_HHMMSS`, used in default report file names. */
export function fileStamp(date: Date): string {
  const d = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const t = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${d}_${t}`;
}

/** Log timestamps are ISO strings; older entries may hold `YYYY-MM-DD HH:MM:SS`. */
export function parseTimestamp(value: string): Date | null {
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

export function displayTimestamp(value: string): string {
  const d = parseTimestamp(value);
  return d ? formatTimestamp(d) : value;
}
