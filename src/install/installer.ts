import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { promises as fs } from "fs";
import * as z from "zod/v4";
import { stableJsonStringify } from "../core/canonicalJson.js";
import { systemClock, type Clock } from "../core/clock.js";
import { newInstallRecordId } from "../core/ids.js";
import { INSTALL_SUCCESS_OUTPUT, type InstallRecord } from "../core/installRecord.js";
import type { SessionOutput } from "../core/sessionOutput.js";
import type { TrackerConfig } from "../config/trackerConfig.js";
import type { RSession, RuntimeInfo } from "../execution/rSession.js";
import type { RArgValue } from "../rlang/rLiteral.js";
import {
  actualInstallCommand,
  dispatchExpression,
  INSTALL_METHODS,
  parseInstallMethod,
  type InstallMethod
} from "../sources/installSources.js";
import type { InstallLogStore } from "../store/installLog.js";

export type ExtraOptions = Record<string, RArgValue>;

export const WRAPPER_TOOL_NAME = "package_install";

/** The tracking-wrapper invocation as it would be typed against the MCP tool. */
export function wrapperCommand(method: InstallMethod, packages: readonly string[], extraOptions: ExtraOptions): string {
  const args: Record<string, unknown> = { packages, method };
  if (Object.keys(extraOptions).length > 0) args.extra_options = extraOptions;
  return `${WRAPPER_TOOL_NAME} ${stableJsonStringify(args)}`;
}

const WRAPPER_LINE = new RegExp(`^${WRAPPER_TOOL_NAME}\\s*(\\{.*)$`);

const zWrapperArgs = z.object({
  method: z.enum(INSTALL_METHODS),
  packages: z.array(z.string()).min(1)
});

/**
 * The plain install command behind a wrapper invocation. Any other text comes back
 * unchanged; a wrapper line whose arguments cannot be read gives null.
 */
export function plainInstallCommand(text: string): string | null {
  const argsText = WRAPPER_LINE.exec(text.trim())?.[1];
  if (argsText === undefined) return text;
  let args: unknown;
  try {
    args = JSON.parse(argsText);
  } catch {
    return null;
  }
  const parsed = zWrapperArgs.safeParse(args);
  return parsed.success ? actualInstallCommand(parsed.data.method, parsed.data.packages) : null;
}

function normalizePackages(packages: readonly string[]): string[] {
  const cleaned = packages.map((p) => p.trim()).filter((p) => p.length > 0);
  if (!cleaned.length) {
    throw new McpError(ErrorCode.InvalidParams, "at least one package name is required");
  }
  return cleaned;
}

export class PackageInstaller {
  private readonly clock: Clock;

  constructor(
    private readonly deps: {
      config: TrackerConfig;
      runtime: RuntimeInfo;
      session: RSession;
      log: InstallLogStore;
      output: SessionOutput;
      clock?: Clock;
    }
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Installs `packages` from `method` into the project library and logs the attempt.
   * Install failures come back as `success: false`; invalid arguments (unknown
   * method, empty package list, bad extra options) throw before anything is logged.
   */
  async install(packages: readonly string[], method: string, extraOptions: ExtraOptions = {}): Promise<InstallRecord> {
    const resolvedMethod = parseInstallMethod(method);
    const names = normalizePackages(packages);
    const { config, runtime, output } = this.deps;

    await fs.mkdir(config.libPath, { recursive: true });

    const record: InstallRecord = {
      recordId: newInstallRecordId(),
      timestamp: this.clock().toISOString(),
      packages: names,
      method: resolvedMethod,
      rVersion: runtime.rVersion,
      platform: runtime.platform,
      command: wrapperCommand(resolvedMethod, names, extraOptions),
      actualCommand: actualInstallCommand(resolvedMethod, names),
      success: false,
      output: null
    };

    const expression = dispatchExpression(resolvedMethod, names, {
      libPath: config.libPath,
      cranRepo: config.cranRepo,
      timeoutSeconds: config.networkTimeoutSeconds,
      extraOptions
    });

    try {
      await this.deps.session.run(expression);
      record.success = true;
      record.output = INSTALL_SUCCESS_OUTPUT;
      output.message(`Installation successful: ${names.join(", ")}`);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      record.success = false;
      record.output = message;
      output.message(`Installation failed: ${message}`);
    }

    await this.deps.log.append(record);
    return record;
  }

  installCran(packages: readonly string[], extraOptions?: ExtraOptions): Promise<InstallRecord> {
    return this.install(packages, "cran", extraOptions);
  }

  installBioc(packages: readonly string[], extraOptions?: ExtraOptions): Promise<InstallRecord> {
    return this.install(packages, "bioc", extraOptions);
  }

  installGithub(packages: readonly string[], extraOptions?: ExtraOptions): Promise<InstallRecord> {
    return this.install(packages, "github", extraOptions);
  }

  installGitlab(packages: readonly string[], extraOptions?: ExtraOptions): Promise<InstallRecord> {
    return this.install(packages, "gitlab", extraOptions);
  }

  installBitbucket(packages: readonly string[], extraOptions?: ExtraOptions): Promise<InstallRecord> {
    return this.install(packages, "bitbucket", extraOptions);
  }
}
