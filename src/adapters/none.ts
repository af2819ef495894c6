import type { PackageManager, SoftResult } from "./types.js";

export class NoPackageManager implements PackageManager {
  readonly name = "none";

  async installPackage(pkg: string): Promise<SoftResult> {
    return { ok: false, error: `no supported package manager to install ${pkg}` };
  }

  async ensureContainerRuntime(): Promise<SoftResult> {
    return { ok: false, error: "no supported package manager to install a container runtime" };
  }
}
