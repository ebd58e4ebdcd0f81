import { describe, it, expect, afterEach } from "vitest";
import type { InstallRecord } from "../src/core/installRecord.js";
import { filterHistory, renderHistory } from "../src/history/historyViewer.js";
import { makeProjectDir, makeTestTracker, removeProjectDir } from "./helpers.js";

function rec(method: InstallRecord["method"], pkg: string, success = true): InstallRecord {
  return {
    recordId: null,
    timestamp: new Date(2024, 4, 6, 7, 8, 9).toISOString(),
    packages: [pkg],
    method,
    rVersion: "4.3.2",
    platform: "x86_64-pc-linux-gnu",
    command: "",
    actualCommand: `install.packages("${pkg}")`,
    success,
    output: success ? "Installation completed successfully" : "Error: x".repeat(30)
  };
}

describe("filterHistory", () => {
  const records = [rec("cran", "a"), rec("bioc", "b"), rec("cran", "c"), rec("github", "d"), rec("cran", "e")];

  it("filters by method before taking the most recent", () => {
    expect(filterHistory(records, { recent: 2, method: "cran" }).map((r) => r.packages[0])).toEqual(["c", "e"]);
    // Taking the last two first would leave only "e".
    expect(filterHistory(records.slice(-2), { method: "cran" }).map((r) => r.packages[0])).toEqual(["e"]);
  });

  it("returns everything in log order without a filter and nothing for recent 0", () => {
    expect(filterHistory(records, {}).map((r) => r.packages[0])).toEqual(["a", "b", "c", "d", "e"]);
    expect(filterHistory(records, { recent: 0 })).toEqual([]);
    expect(filterHistory(records, { recent: 10 })).toHaveLength(5);
  });
});

describe("renderHistory", () => {
  it("shows status, method, packages, command and a truncated error", () => {
    const failed = rec("bioc", "DESeq2", false);
    const lines = renderHistory([failed]).split("\n");
    expect(lines.slice(0, 4)).toEqual(["", "R Package Installation History", "=".repeat(50), ""]);
    expect(lines[4]).toBe("✗ 2024-05-06 07:08:09");
    expect(lines[5]).toBe("   Method: bioc");
    expect(lines[6]).toBe("   Packages: DESeq2");
    expect(lines[7]).toBe('   Command: install.packages("DESeq2")');
    expect(lines[8]).toBe(`   Error: ${"Error: x".repeat(30).slice(0, 100)}`);
  });
});

describe("HistoryViewer", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await removeProjectDir(dir);
    dir = "";
  });

  it("reports a missing log", async () => {
    dir = await makeProjectDir();
    const { tracker, output } = makeTestTracker(dir);
    expect(await tracker.history.show()).toEqual([]);
    expect(output.entries()).toEqual(["No installation history found"]);
  });

  it("prints the filtered records", async () => {
    dir = await makeProjectDir();
    const { tracker, output } = makeTestTracker(dir);
    await tracker.installer.installCran(["a"]);
    await tracker.installer.installBioc(["b"]);
    await tracker.installer.installCran(["c"]);

    const shown = await tracker.history.show({ method: "cran", recent: 1 });
    expect(shown.map((r) => r.packages)).toEqual([["c"]]);
    const printed = output.entries()[output.entries().length - 1] ?? "";
    expect(printed).toContain("   Packages: c");
    expect(printed).not.toContain("   Packages: a");
  });
});
