import { readFileSync } from "node:fs";
import { tmpdir, type } from "node:os";
import { EnvSchema, type InstallerEnv } from "./schema.js";
import { InstallerError, InstallerErrorCode } from "./errors.js";
import { resolveBranch } from "./sources.js";

/**
 * Everything the installer knows about the process it runs in, captured once at
 * startup. Components take this instead of reading `process` themselves.
 */
export interface RuntimeContext {
  /** Kernel name as `uname -s` prints it: "Linux", "Darwin", ... */
  readonly osName: string;
  /** -1 where the platform has no numeric uids. */
  readonly uid: number;
  readonly searchPath: readonly string[];
  readonly branch: string;
  readonly branchOverridden: boolean;
  readonly kernelCmdline: string;
  /** Root of the local source tree used by LocalCopy installs. */
  readonly sourceRoot: string;
  readonly tmpRoot: string;
}

export function parseEnv(env: NodeJS.ProcessEnv): InstallerEnv {
  const result = EnvSchema.safeParse({ BRANCH: env.BRANCH, PATH: env.PATH });
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new InstallerError(
      InstallerErrorCode.INVALID_CONFIG,
      `Invalid environment:\n${issues}`,
    );
  }
  return result.data;
}

export function splitSearchPath(path: string): string[] {
  return path.split(":").filter((entry) => entry.length > 0);
}

function readKernelCmdline(osName: string): string {
  if (osName !== "Linux") return "";
  try {
    return readFileSync("/proc/cmdline", "utf-8");
  } catch {
    // Containers and chroots may hide /proc
    return "";
  }
}

export function createRuntimeContext(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeContext {
  const parsed = parseEnv(env);
  const osName = type();
  return Object.freeze({
    osName,
    uid: typeof process.getuid === "function" ? process.getuid() : -1,
    searchPath: Object.freeze(splitSearchPath(parsed.PATH)),
    branch: resolveBranch(parsed),
    branchOverridden: parsed.BRANCH !== undefined,
    kernelCmdline: readKernelCmdline(osName),
    sourceRoot: process.cwd(),
    tmpRoot: tmpdir(),
  });
}
