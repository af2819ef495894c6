import type { CommandRunner, Probe } from "../exec.js";
import { runSoft } from "./run.js";
import { CONTAINER_RUNTIME, type PackageManager, type SoftResult } from "./types.js";

export class DnfPackageManager implements PackageManager {
  readonly name = "dnf";

  constructor(
    private readonly runner: CommandRunner,
    private readonly probe: Probe,
  ) {}

  installPackage(pkg: string): Promise<SoftResult> {
    return runSoft(this.runner, "dnf", ["install", "-y", pkg]);
  }

  async ensureContainerRuntime(): Promise<SoftResult> {
    if (await this.probe.available(CONTAINER_RUNTIME)) return { ok: true };
    return this.installPackage(CONTAINER_RUNTIME);
  }
}
