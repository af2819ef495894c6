export type PackageManagerName = "dnf" | "apt" | "brew" | "none";

/**
 * Outcome of a best-effort operation. Callers that don't care discard it;
 * a failed result is never thrown.
 */
export type SoftResult = { ok: true } | { ok: false; error: string };

export interface PackageManager {
  readonly name: PackageManagerName;
  installPackage(pkg: string): Promise<SoftResult>;
  ensureContainerRuntime(): Promise<SoftResult>;
}

export const CONTAINER_RUNTIME = "podman";
export const FALLBACK_CONTAINER_RUNTIME = "docker";
