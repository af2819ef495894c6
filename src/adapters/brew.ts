import type { CommandRunner } from "../exec.js";
import { runSoft } from "./run.js";
import type { PackageManager, SoftResult } from "./types.js";

/** Homebrew runs as the invoking user; it is only used for native dependencies. */
export class BrewPackageManager implements PackageManager {
  readonly name = "brew";

  constructor(private readonly runner: CommandRunner) {}

  installPackage(pkg: string): Promise<SoftResult> {
    return runSoft(this.runner, "brew", ["install", pkg]);
  }

  async ensureContainerRuntime(): Promise<SoftResult> {
    return { ok: false, error: "brew does not provision a container runtime" };
  }
}
