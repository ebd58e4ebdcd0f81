import type { InstallRecordId } from "./ids.js";
import type { InstallMethod } from "../sources/installSources.js";

/** One install attempt. Immutable once appended to the log. */
export interface InstallRecord {
  // Absent on entries written before records carried ids.
  recordId: InstallRecordId | null;
  timestamp: string;
  packages: string[];
  method: InstallMethod;
  rVersion: string;
  platform: string;
  // The tracking-wrapper invocation.
  command: string;
  // The same install without the tracker.
  actualCommand: string | null;
  success: boolean;
  output: string | null;
}

export const INSTALL_SUCCESS_OUTPUT = "Installation completed successfully";

export function statusGlyph(success: boolean): string {
  return success ? "✓" : "✗";
}
