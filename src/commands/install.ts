import { join } from "node:path";
import chalk from "chalk";
import { createRuntimeContext, type RuntimeContext } from "../context.js";
import { PathProbe, StreamingRunner, type CommandRunner, type Probe } from "../exec.js";
import { InstallError, InstallerError, InstallerErrorCode, errorMessage } from "../errors.js";
import { AxiosTransport, fetchArtifact, type HttpTransport } from "../fetch.js";
import {
  BIN_DIR_CANDIDATES,
  CommandPlacer,
  DirectPlacer,
  INSTALL_DIR_NAME,
  SHARE_DIR_CANDIDATES,
  place,
  resolveBinDir,
  resolveSharedDir,
  type FilePlacer,
  type PlannedFile,
} from "../installer.js";
import { detectPlatform, ensureDependencies, type Platform } from "../platform.js";
import {
  ARTIFACTS,
  describeSource,
  resolveSource,
  type ArtifactSpec,
  type InstallMode,
  type Source,
} from "../sources.js";
import { createWorkspace, type Workspace } from "../workspace.js";
import { DnfPackageManager } from "../adapters/dnf.js";

/** Distribution package that ships the whole tool. */
export const NATIVE_PACKAGE = "python3-ramalama";

export interface InstallOptions {
  local?: boolean;
  dryRun?: boolean;
  args?: string[];
}

export interface InstallerDeps {
  context: RuntimeContext;
  probe: Probe;
  runner: CommandRunner;
  transport: HttpTransport;
  shareDirCandidates: readonly string[];
  binDirCandidates: readonly string[];
  createPlacer: (platform: Platform) => FilePlacer;
  createWorkspace: (tmpRoot: string) => Promise<Workspace>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface PlanEntry {
  artifact: ArtifactSpec;
  source: Source;
  target: string;
}

function defaultPlacer(platform: Platform): FilePlacer {
  return platform.runner.elevate ? new CommandPlacer(platform.runner) : new DirectPlacer();
}

function resolveDeps(overrides: Partial<InstallerDeps>): InstallerDeps {
  const context = overrides.context ?? createRuntimeContext();
  return {
    context,
    probe: overrides.probe ?? new PathProbe(context.searchPath),
    runner: overrides.runner ?? new StreamingRunner(),
    transport: overrides.transport ?? new AxiosTransport(),
    shareDirCandidates: overrides.shareDirCandidates ?? SHARE_DIR_CANDIDATES,
    binDirCandidates: overrides.binDirCandidates ?? BIN_DIR_CANDIDATES,
    createPlacer: overrides.createPlacer ?? defaultPlacer,
    createWorkspace: overrides.createWorkspace ?? createWorkspace,
    sleep: overrides.sleep,
    now: overrides.now,
  };
}

function buildPlan(
  mode: InstallMode,
  ctx: RuntimeContext,
  binDir: string,
  sharedDir: string,
): PlanEntry[] {
  return ARTIFACTS.map((artifact) => ({
    artifact,
    source: resolveSource(artifact, mode, ctx.branch, ctx.sourceRoot),
    target:
      artifact.role === "entrypoint"
        ? join(binDir, artifact.name)
        : join(sharedDir, INSTALL_DIR_NAME, artifact.name),
  }));
}

function printInstallPlan(plan: PlanEntry[], mode: InstallMode, ctx: RuntimeContext) {
  console.log(chalk.bold("\nInstall Plan:"));
  console.log(
    mode === "local"
      ? `  ${chalk.cyan("Copy")} ${plan.length} files from ${ctx.sourceRoot}`
      : `  ${chalk.cyan("Download")} ${plan.length} files from branch ${ctx.branch}`,
  );
  for (const entry of plan) {
    console.log(chalk.dim(`    ${describeSource(entry.source)} → ${entry.target}`));
  }
}

/** Native package first; the manual install only runs when that isn't possible. */
async function tryNativePackage(
  platform: Platform,
  probe: Probe,
): Promise<boolean> {
  if (!(await probe.available("dnf"))) return false;
  const dnf = new DnfPackageManager(platform.runner, probe);
  const result = await dnf.installPackage(NATIVE_PACKAGE);
  if (!result.ok) {
    console.log(chalk.dim(`  ${NATIVE_PACKAGE} not installable via dnf, installing files instead`));
  }
  return result.ok;
}

function reportFailure(err: unknown): number {
  if (err instanceof InstallerError) {
    console.error(chalk.red(`\n${err.message}`));
    return err.exitCode;
  }
  console.error(chalk.red(`\n${errorMessage(err)}`));
  return 1;
}

/** Runs the whole installation and returns the process exit code. */
export async function runInstaller(
  opts: InstallOptions,
  overrides: Partial<InstallerDeps> = {},
): Promise<number> {
  let workspace: Workspace | undefined;
  try {
    // Answered before the environment is read
    const [query] = opts.args ?? [];
    if (query?.startsWith("get_")) {
      const sharedDir = resolveSharedDir(overrides.shareDirCandidates ?? SHARE_DIR_CANDIDATES);
      if (sharedDir) console.log(sharedDir);
      return 0;
    }

    const deps = resolveDeps(overrides);
    const ctx = deps.context;

    const mode: InstallMode = opts.local ? "local" : "remote";
    console.log(chalk.bold(`\nRamaLama Installer\n`));

    const platform = await detectPlatform(ctx, deps.probe, deps.runner);
    console.log(
      `  Detected: ${chalk.cyan(platform.osName)}` +
        chalk.dim(` (package manager: ${platform.packageManager.name})`),
    );

    // Local installs skip the platform gate
    if (mode === "remote") {
      await ensureDependencies(platform, { provision: !opts.dryRun });
    }

    if (mode === "remote" && !ctx.branchOverridden && !opts.dryRun) {
      if (await tryNativePackage(platform, deps.probe)) {
        console.log(chalk.bold.green(`\nInstalled ${NATIVE_PACKAGE} via dnf.\n`));
        return 0;
      }
    }

    const binDir = resolveBinDir(ctx.searchPath, deps.binDirCandidates);
    if (!binDir) {
      throw new InstallError(InstallerErrorCode.NO_BIN_DIR, "No suitable bin directory found in PATH", {
        context: { candidates: deps.binDirCandidates },
      });
    }
    const sharedDir = resolveSharedDir(deps.shareDirCandidates);
    if (!sharedDir) {
      throw new InstallError(InstallerErrorCode.NO_SHARE_DIR, "No shared install directory found", {
        context: { candidates: deps.shareDirCandidates },
      });
    }

    const plan = buildPlan(mode, ctx, binDir, sharedDir);
    if (opts.dryRun) {
      console.log(chalk.yellow("\nDry run — no changes will be made."));
      printInstallPlan(plan, mode, ctx);
      return 0;
    }

    workspace = await deps.createWorkspace(ctx.tmpRoot);

    const staged: Array<PlanEntry & { staged: string }> = [];
    for (const entry of plan) {
      const stagedPath = join(workspace.path, entry.artifact.name);
      await fetchArtifact(entry.source, stagedPath, {
        transport: deps.transport,
        sleep: deps.sleep,
        now: deps.now,
      });
      staged.push({ ...entry, staged: stagedPath });
    }

    // Libraries before the entry point, so the command never appears without them
    const files: PlannedFile[] = [
      ...staged.filter((s) => s.artifact.role === "library"),
      ...staged.filter((s) => s.artifact.role === "entrypoint"),
    ].map((s) => ({ from: s.staged, to: s.target }));
    await place(files, deps.createPlacer(platform));

    console.log(`  ${chalk.green("OK")}  ${files.length} files installed`);
    console.log(chalk.dim(`  Libraries: ${join(sharedDir, INSTALL_DIR_NAME)}`));
    console.log(chalk.bold.green(`\nInstalled ${files[files.length - 1].to}\n`));
    return 0;
  } catch (err: unknown) {
    return reportFailure(err);
  } finally {
    workspace?.dispose();
  }
}
