import { describe, it, expect, afterEach } from "vitest";
import { promises as fs } from "fs";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { resolveTrackerConfig } from "../src/config/trackerConfig.js";
import { isInstallRecordId } from "../src/core/ids.js";
import { BufferedOutput } from "../src/core/sessionOutput.js";
import { RSession } from "../src/execution/rSession.js";
import { plainInstallCommand, wrapperCommand } from "../src/install/installer.js";
import { createTracker } from "../src/tracker.js";
import { fixedClock, makeProjectDir, makeTestTracker, removeProjectDir, TEST_RUNTIME } from "./helpers.js";

describe("PackageInstaller", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await removeProjectDir(dir);
    dir = "";
  });

  it("installs from CRAN and logs both the wrapper and the plain command", async () => {
    dir = await makeProjectDir();
    const { tracker, runner, output, config } = makeTestTracker(dir);

    const record = await tracker.installer.install(["dplyr", "ggplot2"], "cran");

    expect(record.success).toBe(true);
    expect(record.output).toBe("Installation completed successfully");
    expect(record.packages).toEqual(["dplyr", "ggplot2"]);
    expect(record.actualCommand).toBe('install.packages(c("dplyr", "ggplot2"))');
    expect(record.command).toBe('package_install {"method":"cran","packages":["dplyr","ggplot2"]}');
    expect(record.rVersion).toBe("4.3.2");
    expect(record.platform).toBe("x86_64-pc-linux-gnu");
    expect(record.recordId !== null && isInstallRecordId(record.recordId)).toBe(true);
    expect(record.timestamp).toBe(new Date(2024, 2, 5, 14, 7, 9).toISOString());

    expect(runner.specs).toHaveLength(1);
    expect(runner.specs[0]?.argv.slice(0, 3)).toEqual(["Rscript", "--vanilla", "-e"]);
    expect(runner.specs[0]?.cwd).toBe(config.projectDir);
    expect(runner.expressions[0]).toContain('install.packages(c("dplyr", "ggplot2"), lib = lib_path)');

    expect((await fs.stat(config.libPath)).isDirectory()).toBe(true);
    expect(await tracker.log.readAll()).toEqual([record]);
    expect(output.entries()).toEqual(["Installation successful: dplyr, ggplot2", "Installation logged"]);
  });

  it("records a failed Bioconductor install without throwing", async () => {
    dir = await makeProjectDir();
    const { tracker, output } = makeTestTracker(dir, [
      { exitCode: 1, stderr: "Error: package not found\nExecution halted\n" }
    ]);

    const record = await tracker.installer.installBioc(["DESeq2"]);

    expect(record.success).toBe(false);
    expect(record.output).toBe("Error: package not found");
    expect(record.actualCommand).toBe('BiocManager::install("DESeq2")');
    const [logged] = await tracker.log.readAll();
    expect(logged?.success).toBe(false);
    expect(logged?.output).toBe("Error: package not found");
    expect(output.entries()).toEqual(["Installation failed: Error: package not found", "Installation logged"]);
  });

  it("appends one record per attempt in call order", async () => {
    dir = await makeProjectDir();
    const { tracker } = makeTestTracker(dir, [{ exitCode: 0 }, { exitCode: 1, stderr: "Error: boom" }, { exitCode: 0 }]);

    await tracker.installer.installCran(["a"]);
    await tracker.installer.installGithub(["owner/b@main"]);
    await tracker.installer.installGitlab(["grp/c"]);

    const all = await tracker.log.readAll();
    expect(all.map((r) => [r.method, r.success])).toEqual([
      ["cran", true],
      ["github", false],
      ["gitlab", true]
    ]);
  });

  it("rejects invalid arguments before anything is logged", async () => {
    dir = await makeProjectDir();
    const { tracker, runner } = makeTestTracker(dir);

    await expect(tracker.installer.install(["x"], "conda")).rejects.toBeInstanceOf(McpError);
    await expect(tracker.installer.install(["  "], "cran")).rejects.toBeInstanceOf(McpError);
    await expect(tracker.installer.install(["x"], "cran", { lib: "/tmp/elsewhere" })).rejects.toBeInstanceOf(McpError);

    expect(runner.specs).toHaveLength(0);
    expect(await tracker.log.exists()).toBe(false);
  });

  it("records a missing Rscript as a failed install", async () => {
    dir = await makeProjectDir();
    const config = resolveTrackerConfig(
      { version: 1, runtime: { rscript: "/nonexistent/Rscript", r_version: "4.3.2", platform: "x86_64-pc-linux-gnu" } },
      { projectDir: dir }
    );
    const output = new BufferedOutput();
    const tracker = createTracker({ config, runtime: TEST_RUNTIME, session: new RSession({ config }), output, clock: fixedClock() });

    const record = await tracker.installer.installCran(["dplyr"]);
    expect(record.success).toBe(false);
    expect(record.output).toContain("ENOENT");
    expect((await tracker.log.readAll()).map((r) => r.success)).toEqual([false]);
  });

  it("recovers the plain command from a wrapper invocation", () => {
    expect(plainInstallCommand('package_install {"method":"bioc","packages":["DESeq2","limma"]}')).toBe(
      'BiocManager::install(c("DESeq2", "limma"))'
    );
    expect(plainInstallCommand(wrapperCommand("github", ["o/r"], { upgrade: "never" }))).toBe('remotes::install_github("o/r")');
    expect(plainInstallCommand('package_install {"method":"svn","packages":["x"]}')).toBeNull();
    expect(plainInstallCommand('package_install {"method":"cran"')).toBeNull();
    expect(plainInstallCommand('install.packages("x")')).toBe('install.packages("x")');
  });

  it("keeps extra options in the wrapper command only when present", () => {
    expect(wrapperCommand("bioc", ["DESeq2"], {})).toBe('package_install {"method":"bioc","packages":["DESeq2"]}');
    expect(wrapperCommand("github", ["o/r"], { upgrade: "never" })).toBe(
      'package_install {"extra_options":{"upgrade":"never"},"method":"github","packages":["o/r"]}'
    );
  });
});
