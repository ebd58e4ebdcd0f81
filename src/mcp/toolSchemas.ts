import * as z from "zod/v4";
import { INSTALL_METHODS, INSTALL_SOURCES } from "../sources/installSources.js";

export const zInstallMethod = z
  .enum(INSTALL_METHODS)
  .describe(INSTALL_METHODS.map((m) => `${m}: ${INSTALL_SOURCES[m].description}`).join("; "));

export const zExtraOptionValue = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

export const zInstallRecord = z.object({
  record_id: z.string().nullable(),
  timestamp: z.string(),
  packages: z.array(z.string()),
  method: zInstallMethod,
  r_version: z.string(),
  platform: z.string(),
  command: z.string(),
  actual_command: z.string().nullable(),
  success: z.boolean(),
  output: z.string().nullable()
});

export const zPackageSummary = z.object({
  name: z.string(),
  version: z.string().nullable(),
  repository: z.string().nullable(),
  remote_type: z.string().nullable(),
  remote_repo: z.string().nullable(),
  remote_username: z.string().nullable(),
  remote_ref: z.string().nullable(),
  description_fields: z.record(z.string(), z.string()),
  install_command_used: z.string().nullable(),
  actual_install_command: z.string().nullable(),
  reproduce_install: z.string(),
  install_timestamp: z.string().nullable(),
  install_method: zInstallMethod.nullable(),
  matched_by: z.enum(["log", "history", "none"]),
  classification: z.enum(["manual", "dependency"])
});

export const zAnalysisSummary = z.object({
  total_packages: z.number().int(),
  manually_installed_count: z.number().int(),
  dependencies_count: z.number().int(),
  r_version: z.string(),
  lib_path: z.string()
});

const zOutputPath = z.string().min(1).max(512);

export const zPackageInstallInput = z.object({
  packages: z.array(z.string().min(1).max(256)).min(1).max(200),
  method: zInstallMethod.default("cran"),
  extra_options: z.record(z.string(), zExtraOptionValue).optional()
});

export const zPackageInstallOutput = z.object({
  record: zInstallRecord
});

export const zInstallHistoryInput = z.object({
  recent: z.number().int().min(0).optional(),
  method: zInstallMethod.optional()
});

export const zInstallHistoryOutput = z.object({
  record_count: z.number().int(),
  records: z.array(zInstallRecord)
});

export const zPackageAnalyzeInput = z.object({
  lib_path: zOutputPath.optional(),
  rhistory_path: zOutputPath.optional()
});

export const zPackageAnalyzeOutput = z.object({
  summary: zAnalysisSummary,
  manually_installed: z.record(z.string(), zPackageSummary),
  dependencies: z.record(z.string(), zPackageSummary)
});

export const zLibraryCheckInput = z.object({});

export const zLibraryCheckOutput = z.object({
  libraries: z.array(z.object({ name: z.string(), path: z.string(), package_count: z.number().int() }))
});

export const zReproducibilityReportInput = z.object({
  output_path: zOutputPath.optional()
});

export const zReproducibilityReportOutput = z.object({
  path: z.string(),
  generated_at: z.string(),
  total_packages: z.number().int(),
  manually_installed_count: z.number().int(),
  dependencies_count: z.number().int(),
  library_fingerprint: z.string()
});

export const zInstallScriptInput = z.object({
  prefer_pinned: z.boolean().default(true),
  include_dependencies: z.boolean().default(false),
  output_path: zOutputPath.nullable().optional()
});

export const zGeneratedScriptOutput = z.object({
  path: z.string().nullable(),
  command_count: z.number().int(),
  commands: z.array(z.string()),
  script: z.string()
});

export const zContainerScriptInput = z.object({
  include_dependencies: z.boolean().default(false),
  format: z.enum(["script", "container_post", "definition"]).default("script"),
  output_path: zOutputPath.nullable().optional()
});

export const zReproducibilityFullInput = z.object({});

export const zReproducibilityFullOutput = z.object({
  report_path: z.string(),
  script_path: z.string(),
  summary: zAnalysisSummary
});
