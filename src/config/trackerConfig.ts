import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";

const zOptionalPath = z.string().nullable().optional();

export const zTrackerConfigFile = z.object({
  version: z.number().int().min(1),
  project_dir: zOptionalPath,
  paths: z
    .object({
      library: zOptionalPath,
      history_json: zOptionalPath,
      history_text: zOptionalPath,
      rhistory: zOptionalPath
    })
    .optional(),
  repos: z.object({ cran: z.string().nullable().optional() }).optional(),
  network_timeout_seconds: z.number().int().min(1).optional(),
  max_runtime_seconds: z.number().int().min(1).optional(),
  runtime: z
    .object({
      backend: z.enum(["local_process", "apptainer"]).optional(),
      rscript: z.string().nullable().optional(),
      r_version: z.string().nullable().optional(),
      platform: z.string().nullable().optional(),
      apptainer: z
        .object({
          binary: z.string().nullable().optional(),
          image: zOptionalPath,
          binds: z.array(z.string()).optional()
        })
        .optional()
    })
    .optional(),
  container: z.object({ base_image: z.string().nullable().optional() }).optional()
});

export type TrackerConfigFile = z.infer<typeof zTrackerConfigFile>;

export type RuntimeBackend = "local_process" | "apptainer";

export interface TrackerConfig {
  projectDir: string;
  // As written in the configuration; generated scripts use this relative form.
  libPathSetting: string;
  libPath: string;
  historyJsonPath: string;
  historyTextPath: string;
  rhistoryPath: string;
  cranRepo: string;
  networkTimeoutSeconds: number;
  maxRuntimeSeconds: number;
  runtime: {
    backend: RuntimeBackend;
    rscript: string;
    rVersion: string | null;
    platform: string | null;
    apptainer: {
      binary: string;
      image: string | null;
      binds: string[];
    };
  };
  container: {
    baseImage: string | null;
  };
  configHash: `sha256:${string}`;
}

export const DEFAULT_LIBRARY_DIR = "R_libs";
export const DEFAULT_HISTORY_JSON = ".r_install_history.json";
export const DEFAULT_HISTORY_TEXT = ".r_install_history.txt";
export const DEFAULT_RHISTORY = ".Rhistory";
export const DEFAULT_CRAN_REPO = "https://cloud.r-project.org";

export function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const braced = /^\$\{([A-Za-z0-9_]+)\}$/.exec(trimmed);
  const bare = /^\$([A-Za-z0-9_]+)$/.exec(trimmed);
  const varName = braced?.[1] ?? bare?.[1];
  if (varName) {
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return trimmed.length > 0 ? value : null;
}

function setting(value: string | null | undefined, fallback: string): string {
  if (value === null || value === undefined) return fallback;
  return expandEnvToken(value) ?? fallback;
}

function optionalSetting(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return expandEnvToken(value);
}

export function resolveTrackerConfig(raw: unknown, opts: { projectDir?: string } = {}): TrackerConfig {
  const parsed = zTrackerConfigFile.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid tracker config: ${z.prettifyError(parsed.error)}`);
  }
  const file = parsed.data;

  const projectDir = path.resolve(opts.projectDir ?? setting(file.project_dir, process.cwd()));
  const inProject = (p: string): string => path.resolve(projectDir, p);
  const libPathSetting = setting(file.paths?.library, DEFAULT_LIBRARY_DIR);

  const config: Omit<TrackerConfig, "configHash"> = {
    projectDir,
    libPathSetting,
    libPath: inProject(libPathSetting),
    historyJsonPath: inProject(setting(file.paths?.history_json, DEFAULT_HISTORY_JSON)),
    historyTextPath: inProject(setting(file.paths?.history_text, DEFAULT_HISTORY_TEXT)),
    rhistoryPath: inProject(setting(file.paths?.rhistory, DEFAULT_RHISTORY)),
    cranRepo: setting(file.repos?.cran, DEFAULT_CRAN_REPO),
    networkTimeoutSeconds: file.network_timeout_seconds ?? 600,
    maxRuntimeSeconds: file.max_runtime_seconds ?? 3600,
    runtime: {
      backend: file.runtime?.backend ?? "local_process",
      rscript: setting(file.runtime?.rscript, "Rscript"),
      rVersion: optionalSetting(file.runtime?.r_version),
      platform: optionalSetting(file.runtime?.platform),
      apptainer: {
        binary: setting(file.runtime?.apptainer?.binary, "apptainer"),
        image: optionalSetting(file.runtime?.apptainer?.image),
        binds: (file.runtime?.apptainer?.binds ?? [])
          .map((b) => expandEnvToken(b))
          .filter((b): b is string => typeof b === "string")
      }
    },
    container: {
      baseImage: optionalSetting(file.container?.base_image)
    }
  };

  if (config.runtime.backend === "apptainer" && !config.runtime.apptainer.image) {
    throw new Error("invalid tracker config: runtime.apptainer.image is required when runtime.backend is apptainer");
  }

  return Object.freeze({ ...config, configHash: sha256Prefixed(stableJsonStringify(config)) });
}

export async function loadTrackerConfig(filePath: string, opts: { projectDir?: string } = {}): Promise<TrackerConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) as unknown;
  } catch (e) {
    throw new Error(`invalid tracker config at ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return resolveTrackerConfig(parsed, opts);
}
