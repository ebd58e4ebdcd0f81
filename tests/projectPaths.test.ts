import { describe, it, expect } from "vitest";
import path from "path";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { projectPath } from "../src/mcp/projectPaths.js";

describe("projectPath", () => {
  const base = path.resolve("/work/proj");

  it("resolves relative names inside the project", () => {
    expect(projectPath(base, "reports/env.json")).toBe(path.join(base, "reports", "env.json"));
    expect(projectPath(base, path.join(base, "R_libs"))).toBe(path.join(base, "R_libs"));
  });

  it("refuses names that escape the project", () => {
    expect(() => projectPath(base, "../other/file.R")).toThrow(McpError);
    expect(() => projectPath(base, "/etc/passwd")).toThrow("path outside project directory: /etc/passwd");
  });
});
