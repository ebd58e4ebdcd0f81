import { rString } from "../rlang/rLiteral.js";
import { INSTALL_SOURCES, isInstallMethod, isVcsMethod } from "../sources/installSources.js";

export interface PackageProvenance {
  name: string;
  version: string | null;
  repository: string | null;
  remoteType: string | null;
  remoteRepo: string | null;
  remoteUsername: string | null;
  remoteRef: string | null;
}

export const DEFAULT_REMOTE_REF = "HEAD";

export function unknownSourcePlaceholder(name: string): string {
  return `# Unknown source for ${name}`;
}

function installVersion(name: string, version: string): string {
  return `remotes::install_version(${rString(name)}, version = ${rString(version)})`;
}

/**
 * The version- or ref-pinned command that rebuilds the installed package, in order:
 * VCS remote, Bioconductor (version noted, not enforced), CRAN, any versioned
 * package assumed CRAN, otherwise a placeholder comment.
 */
export function reproduceInstallCommand(p: PackageProvenance): string {
  const remoteType = p.remoteType?.toLowerCase() ?? null;
  if (remoteType && isInstallMethod(remoteType) && isVcsMethod(remoteType) && p.remoteRepo && p.remoteUsername) {
    const ref = p.remoteRef ?? DEFAULT_REMOTE_REF;
    return `${INSTALL_SOURCES[remoteType].installer}(${rString(`${p.remoteUsername}/${p.remoteRepo}@${ref}`)})`;
  }

  if (p.repository && p.repository.includes("BioC")) {
    return `${INSTALL_SOURCES.bioc.installer}(${rString(p.name)}) # version: ${p.version ?? "unknown"}`;
  }

  if (p.version) {
    // Covers both `Repository: CRAN` and packages with no declared repository.
    return installVersion(p.name, p.version);
  }

  return unknownSourcePlaceholder(p.name);
}
