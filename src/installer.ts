import { statSync } from "node:fs";
import { chmod, copyFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { CommandRunner } from "./exec.js";
import { InstallError, InstallerErrorCode, errorMessage } from "./errors.js";

export const SHARE_DIR_CANDIDATES = [
  "/opt/homebrew/share",
  "/usr/local/share",
  "/usr/share",
] as const;

export const BIN_DIR_CANDIDATES = [
  "/opt/homebrew/bin",
  "/usr/local/bin",
  "/usr/bin",
  "/bin",
] as const;

export const INSTALL_DIR_NAME = "ramalama";
export const FILE_MODE = 0o755;

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Where the library files live. Nothing is created here. */
export function resolveSharedDir(
  candidates: readonly string[] = SHARE_DIR_CANDIDATES,
): string | undefined {
  const root = candidates.find(isDirectory);
  return root === undefined ? undefined : join(root, INSTALL_DIR_NAME);
}

const trimSlashes = (dir: string) =>
  dir.length > 1 ? dir.replace(/\/+$/, "") : dir;

/** First candidate that is literally one of the search path entries. */
export function resolveBinDir(
  searchPath: readonly string[],
  candidates: readonly string[] = BIN_DIR_CANDIDATES,
): string | undefined {
  const entries = new Set(searchPath.map(trimSlashes));
  return candidates.find((dir) => entries.has(trimSlashes(dir)));
}

export interface PlannedFile {
  from: string;
  to: string;
}

export interface FilePlacer {
  ensureDir(dir: string): Promise<void>;
  placeFile(from: string, to: string): Promise<void>;
}

export class DirectPlacer implements FilePlacer {
  async ensureDir(dir: string): Promise<void> {
    // Existing directories keep their permissions
    const created = await mkdir(dir, { recursive: true, mode: FILE_MODE });
    if (created === undefined) return;
    // mkdir applies the umask to every directory it creates
    const made = [dir];
    for (let current = dir; current !== created; ) {
      const parent = dirname(current);
      if (parent === current) break;
      made.unshift(parent);
      current = parent;
    }
    for (const path of made) {
      await chmod(path, FILE_MODE);
    }
  }

  async placeFile(from: string, to: string): Promise<void> {
    await copyFile(from, to);
    await chmod(to, FILE_MODE);
  }
}

/** Uses install(1), so sudo can be put in front of it by the runner. */
export class CommandPlacer implements FilePlacer {
  constructor(private readonly runner: CommandRunner) {}

  async ensureDir(dir: string): Promise<void> {
    await this.install(["-m755", "-d", dir]);
  }

  async placeFile(from: string, to: string): Promise<void> {
    await this.install(["-m755", from, to]);
  }

  private async install(args: string[]): Promise<void> {
    const { ok, code, output } = await this.runner.run("install", args);
    if (!ok) {
      throw new Error(`install ${args.join(" ")} exited with code ${code}${output ? `: ${output}` : ""}`);
    }
  }
}

/**
 * Creates every parent directory, then copies the files in order. Call only
 * once every file of the installation has been fetched.
 */
export async function place(
  files: readonly PlannedFile[],
  placer: FilePlacer,
): Promise<void> {
  const dirs = [...new Set(files.map((f) => dirname(f.to)))];
  try {
    for (const dir of dirs) {
      await placer.ensureDir(dir);
    }
    for (const file of files) {
      await placer.placeFile(file.from, file.to);
    }
  } catch (err: unknown) {
    throw new InstallError(InstallerErrorCode.IO, `Installation failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
