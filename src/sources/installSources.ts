import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { rCall, rNamedArgs, rString, rStringOrVector, type RArgValue } from "../rlang/rLiteral.js";

export const INSTALL_METHODS = ["cran", "bioc", "github", "gitlab", "bitbucket"] as const;

export type InstallMethod = (typeof INSTALL_METHODS)[number];

export const HELPER_PACKAGES = ["BiocManager", "remotes"] as const;

export type HelperPackage = (typeof HELPER_PACKAGES)[number];

export type VcsInstallMethod = Extract<InstallMethod, "github" | "gitlab" | "bitbucket">;

export interface InstallSource {
  method: InstallMethod;
  description: string;
  // Function called both by the tracker and by the plain command written to the log.
  installer: string;
  // Package that provides `installer`; installed into the target library first when missing.
  helperPackage: HelperPackage | null;
  // Arguments the tracker adds at dispatch time only (never part of the plain command).
  dispatchArgs: Record<string, RArgValue>;
}

export const INSTALL_SOURCES = {
  cran: {
    method: "cran",
    description: "CRAN (or the configured CRAN-like mirror)",
    installer: "install.packages",
    helperPackage: null,
    dispatchArgs: {}
  },
  bioc: {
    method: "bioc",
    description: "Bioconductor via BiocManager",
    installer: "BiocManager::install",
    helperPackage: "BiocManager",
    dispatchArgs: { update: false, ask: false }
  },
  github: {
    method: "github",
    description: "GitHub repository via remotes",
    installer: "remotes::install_github",
    helperPackage: "remotes",
    dispatchArgs: {}
  },
  gitlab: {
    method: "gitlab",
    description: "GitLab repository via remotes",
    installer: "remotes::install_gitlab",
    helperPackage: "remotes",
    dispatchArgs: {}
  },
  bitbucket: {
    method: "bitbucket",
    description: "Bitbucket repository via remotes",
    installer: "remotes::install_bitbucket",
    helperPackage: "remotes",
    dispatchArgs: {}
  }
} as const satisfies Record<InstallMethod, InstallSource>;

const METHOD_SET: ReadonlySet<string> = new Set<string>(INSTALL_METHODS);

export function isInstallMethod(value: string): value is InstallMethod {
  return METHOD_SET.has(value);
}

export function parseInstallMethod(value: string): InstallMethod {
  if (isInstallMethod(value)) return value;
  throw new McpError(
    ErrorCode.InvalidParams,
    `unknown install method: ${value} (use ${INSTALL_METHODS.map((m) => `'${m}'`).join(", ")})`
  );
}

export function isVcsMethod(method: InstallMethod): method is VcsInstallMethod {
  switch (method) {
    case "github":
    case "gitlab":
    case "bitbucket":
      return true;
    case "cran":
    case "bioc":
      return false;
    default: {
      const unreachable: never = method;
      throw new Error(`unhandled install method: ${String(unreachable)}`);
    }
  }
}

/**
 * The wrapper-free command: running it in a plain R session reproduces the install.
 * One package uses the scalar form, several the `c(...)` form.
 */
export function actualInstallCommand(method: InstallMethod, packages: readonly string[]): string {
  return rCall(INSTALL_SOURCES[method].installer, [rStringOrVector(packages)]);
}

export function repositoryOptions(cranRepo: string, timeoutSeconds: number): string {
  return `options(repos = c(CRAN = ${rString(cranRepo)}), timeout = ${Math.max(1, Math.floor(timeoutSeconds))})`;
}

/** Installs `helper` when it cannot be loaded; `libVar` names the R variable holding the target library. */
export function helperBootstrap(helper: HelperPackage, libVar: string | null): string {
  const target = libVar === null ? "" : `, lib = ${libVar}`;
  return `if (!requireNamespace(${rString(helper)}, quietly = TRUE)) install.packages(${rString(helper)}${target})`;
}

/** Helper packages that `commands` call through `pkg::`. */
export function helpersReferenced(commands: readonly string[]): HelperPackage[] {
  return HELPER_PACKAGES.filter((helper) => commands.some((c) => c.includes(`${helper}::`)));
}

export interface DispatchOptions {
  libPath: string;
  cranRepo: string;
  timeoutSeconds: number;
  extraOptions?: Record<string, RArgValue>;
}

const RESERVED_OPTION_NAMES = new Set(["lib", "pkgs", "repo", "repos"]);

/** The R program the tracker runs for one install attempt. */
export function dispatchExpression(method: InstallMethod, packages: readonly string[], opts: DispatchOptions): string {
  const source = INSTALL_SOURCES[method];
  const extra = opts.extraOptions ?? {};
  for (const name of Object.keys(extra)) {
    if (RESERVED_OPTION_NAMES.has(name)) {
      throw new McpError(ErrorCode.InvalidParams, `extra option '${name}' is set by the tracker and cannot be overridden`);
    }
  }

  const lines: string[] = [];
  lines.push(repositoryOptions(opts.cranRepo, opts.timeoutSeconds));
  lines.push(`lib_path <- ${rString(opts.libPath)}`);
  lines.push(`if (!dir.exists(lib_path)) dir.create(lib_path, recursive = TRUE)`);
  lines.push(`.libPaths(c(lib_path, .libPaths()))`);
  if (source.helperPackage) lines.push(helperBootstrap(source.helperPackage, "lib_path"));

  const call = rCall(source.installer, [rStringOrVector(packages)], [
    "lib = lib_path",
    ...rNamedArgs({ ...source.dispatchArgs, ...extra })
  ]);

  // install.packages() reports a failed build as a warning; promote those to errors so the exit status carries them.
  lines.push("withCallingHandlers(");
  lines.push(`  ${call},`);
  lines.push("  warning = function(w) {");
  lines.push('    msg <- conditionMessage(w)');
  lines.push('    if (grepl("non-zero exit status|is not available|installation of package", msg)) stop(msg, call. = FALSE)');
  lines.push("  }");
  lines.push(")");

  return lines.join("\n");
}
