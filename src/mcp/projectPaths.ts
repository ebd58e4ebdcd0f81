import path from "path";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

/** Resolves a client-supplied path inside the project directory; anything escaping it is refused. */
export function projectPath(projectDir: string, name: string): string {
  const base = path.resolve(projectDir);
  const joined = path.resolve(base, name);
  const rel = path.relative(base, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new McpError(ErrorCode.InvalidRequest, `path outside project directory: ${name}`);
  }
  return joined;
}
