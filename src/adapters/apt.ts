import type { CommandRunner, Probe } from "../exec.js";
import { runSoft } from "./run.js";
import {
  CONTAINER_RUNTIME,
  FALLBACK_CONTAINER_RUNTIME,
  type PackageManager,
  type SoftResult,
} from "./types.js";

export class AptPackageManager implements PackageManager {
  readonly name = "apt";

  constructor(
    private readonly runner: CommandRunner,
    private readonly probe: Probe,
  ) {}

  installPackage(pkg: string): Promise<SoftResult> {
    return runSoft(this.runner, "apt", ["install", "-y", pkg]);
  }

  async ensureContainerRuntime(): Promise<SoftResult> {
    if (await this.probe.available(CONTAINER_RUNTIME)) return { ok: true };

    // Stale indexes only make the install below fail, so carry on regardless
    await runSoft(this.runner, "apt", ["update"]);

    const primary = await this.installPackage(CONTAINER_RUNTIME);
    if (primary.ok) return primary;

    // Docker only when podman can't be installed
    if (await this.probe.available(FALLBACK_CONTAINER_RUNTIME)) return { ok: true };
    return this.installPackage(FALLBACK_CONTAINER_RUNTIME);
  }
}
