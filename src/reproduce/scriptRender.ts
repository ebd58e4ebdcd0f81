import { formatTimestamp } from "../core/clock.js";
import { rString } from "../rlang/rLiteral.js";
import { helperBootstrap, helpersReferenced, repositoryOptions } from "../sources/installSources.js";

export type ContainerScriptFormat = "script" | "container_post" | "definition";

export const CONTAINER_LIBRARY_PATH = "/project/R_libs";

export function shellSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export interface RepositorySettings {
  cranRepo: string;
  timeoutSeconds: number;
}

export function renderInstallScript(input: {
  generatedAt: Date;
  rVersion: string;
  libPathSetting: string;
  repositories: RepositorySettings;
  commands: readonly string[];
}): string {
  const helpers = helpersReferenced(input.commands);
  return [
    "#!/usr/bin/env Rscript",
    "# R Package Installation Script",
    `# Generated: ${formatTimestamp(input.generatedAt)}`,
    `# R version: ${input.rVersion}`,
    "",
    "# Set CRAN mirror",
    repositoryOptions(input.repositories.cranRepo, input.repositories.timeoutSeconds),
    "",
    "# Set library path",
    `lib_path <- ${rString(input.libPathSetting)}`,
    "if (!dir.exists(lib_path)) dir.create(lib_path, recursive = TRUE)",
    ".libPaths(c(lib_path, .libPaths()))",
    ...(helpers.length ? ["", "# Installer helpers", ...helpers.map((h) => helperBootstrap(h, "lib_path"))] : []),
    "",
    "# Install packages",
    ...input.commands
  ].join("\n");
}

/** One `%post` line per command; comment-only commands (unknown sources) stay comments. */
export function postInstallLines(commands: readonly string[]): string[] {
  return commands.map((cmd) => (cmd.startsWith("#") ? `    ${cmd}` : `    R -e ${shellSingleQuote(cmd)}`));
}

/**
 * `%post` lines that point every later `R -e` at the mirror (through the site profile)
 * and install the helper packages the commands call.
 */
export function postSetupLines(repositories: RepositorySettings, commands: readonly string[]): string[] {
  const options = repositoryOptions(repositories.cranRepo, repositories.timeoutSeconds);
  return [
    `    echo ${shellSingleQuote(options)} >> "$(R RHOME)/etc/Rprofile.site"`,
    ...postInstallLines(helpersReferenced(commands).map((h) => helperBootstrap(h, null)))
  ];
}

export function renderContainerScript(input: {
  generatedAt: Date;
  rVersion: string;
  baseImage: string;
  format: ContainerScriptFormat;
  repositories: RepositorySettings;
  commands: readonly string[];
}): string {
  const generated = `# Generated: ${formatTimestamp(input.generatedAt)}`;

  switch (input.format) {
    case "script":
      return [
        "#!/usr/bin/env Rscript",
        "# R Package Installation Script for Container",
        generated,
        `# R version: ${input.rVersion}`,
        "",
        "# Note: This script uses actual R commands, not tracking wrappers",
        "# Suitable for use in a container definition %post section",
        "",
        "cat('Installing packages...\\n')",
        "",
        repositoryOptions(input.repositories.cranRepo, input.repositories.timeoutSeconds),
        ...helpersReferenced(input.commands).map((h) => helperBootstrap(h, null)),
        "",
        ...input.commands,
        "",
        "cat('Installation complete!\\n')"
      ].join("\n");

    case "container_post":
      return [
        "# Add these lines to your container definition %post section",
        generated,
        `# Based on R version: ${input.rVersion}`,
        "",
        "# Repository and installer helpers",
        ...postSetupLines(input.repositories, input.commands),
        "",
        "# Package installations",
        ...postInstallLines(input.commands)
      ].join("\n");

    case "definition":
      return [
        "Bootstrap: docker",
        `From: ${input.baseImage}`,
        "",
        "%labels",
        `    Generated ${formatTimestamp(input.generatedAt)}`,
        `    RVersion ${input.rVersion}`,
        "",
        "%environment",
        `    export R_LIBS_USER=${CONTAINER_LIBRARY_PATH}`,
        "",
        "%post",
        ...postSetupLines(input.repositories, input.commands),
        ...postInstallLines(input.commands)
      ].join("\n");

    default: {
      const unreachable: never = input.format;
      throw new Error(`unknown container script format: ${String(unreachable)}`);
    }
  }
}
