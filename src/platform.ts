import chalk from "chalk";
import type { RuntimeContext } from "./context.js";
import { ElevatedRunner, type CommandRunner, type Probe } from "./exec.js";
import {
  MissingDependencyError,
  PrivilegeError,
  UnsupportedPlatformError,
} from "./errors.js";
import { AptPackageManager } from "./adapters/apt.js";
import { BrewPackageManager } from "./adapters/brew.js";
import { DnfPackageManager } from "./adapters/dnf.js";
import { NoPackageManager } from "./adapters/none.js";
import type { PackageManager, SoftResult } from "./adapters/types.js";

export type OperatingSystem = "Linux" | "Darwin" | "Other";

export interface Platform {
  operatingSystem: OperatingSystem;
  osName: string;
  packageManager: PackageManager;
  isRoot: boolean;
  hasSudo: boolean;
  immutableRoot: boolean;
  /** Privileged commands run through sudo when set. */
  runner: ElevatedRunner;
}

/** Native dependency macOS needs before the program can run. */
export const MACOS_DEPENDENCY = "llama.cpp";

const IMMUTABLE_ROOT_MARKER = "ostree=";

function classify(osName: string): OperatingSystem {
  if (osName === "Linux" || osName === "Darwin") return osName;
  return "Other";
}

export async function detectPlatform(
  ctx: RuntimeContext,
  probe: Probe,
  runner: CommandRunner,
): Promise<Platform> {
  const operatingSystem = classify(ctx.osName);
  const isRoot = ctx.uid === 0;
  const base = { operatingSystem, osName: ctx.osName, isRoot };

  if (operatingSystem === "Darwin") {
    const plain = new ElevatedRunner(runner, false);
    return {
      ...base,
      hasSudo: false,
      immutableRoot: false,
      runner: plain,
      packageManager: (await probe.available("brew"))
        ? new BrewPackageManager(plain)
        : new NoPackageManager(),
    };
  }

  if (operatingSystem === "Other") {
    return {
      ...base,
      hasSudo: false,
      immutableRoot: false,
      runner: new ElevatedRunner(runner, false),
      packageManager: new NoPackageManager(),
    };
  }

  const hasSudo = await probe.available("sudo");
  const immutableRoot = ctx.kernelCmdline.includes(IMMUTABLE_ROOT_MARKER);
  const elevated = new ElevatedRunner(runner, !isRoot && hasSudo);

  let packageManager: PackageManager;
  if ((await probe.available("dnf")) && !immutableRoot) {
    packageManager = new DnfPackageManager(elevated, probe);
  } else if (await probe.available("apt")) {
    packageManager = new AptPackageManager(elevated, probe);
  } else {
    packageManager = new NoPackageManager();
  }

  return { ...base, hasSudo, immutableRoot, runner: elevated, packageManager };
}

function reportSoft(what: string, result: SoftResult): void {
  if (result.ok) {
    console.log(`  ${chalk.green("OK")}  ${what}`);
  } else {
    console.log(`  ${chalk.yellow("SKIP")}  ${what}${chalk.dim(` — ${result.error}`)}`);
  }
}

/**
 * Fails on hosts the installer cannot handle, then provisions what the program
 * needs at runtime. Provisioning failures are reported and ignored.
 */
export async function ensureDependencies(
  platform: Platform,
  opts: { provision: boolean },
): Promise<void> {
  switch (platform.operatingSystem) {
    case "Other":
      throw new UnsupportedPlatformError(platform.osName);

    case "Darwin": {
      if (platform.isRoot) {
        throw new PrivilegeError("This installer is intended to run as non-root on macOS", 1);
      }
      if (platform.packageManager.name !== "brew") {
        throw new MissingDependencyError(
          "brew",
          "Install brew and add the directory containing brew to the PATH before continuing.",
        );
      }
      if (!opts.provision) return;
      reportSoft(
        `brew install ${MACOS_DEPENDENCY}`,
        await platform.packageManager.installPackage(MACOS_DEPENDENCY),
      );
      return;
    }

    case "Linux": {
      if (!platform.isRoot && !platform.hasSudo) {
        throw new PrivilegeError("This installer is intended to run as root on Linux, or with sudo available", 3);
      }
      if (!opts.provision) return;
      reportSoft(
        `container runtime via ${platform.packageManager.name}`,
        await platform.packageManager.ensureContainerRuntime(),
      );
      return;
    }
  }
}
