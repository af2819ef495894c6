import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { join } from "node:path";
import chalk from "chalk";

export interface CommandResult {
  ok: boolean;
  code: number;
  output?: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

export interface Probe {
  available(name: string): Promise<boolean>;
}

/** Run a command with real-time stdout/stderr output. Never rejects. */
export function spawnStreaming(
  command: string,
  args: string[],
  opts?: { timeout?: number },
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: "inherit" });
    let timedOut = false;
    const timer = opts?.timeout
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, opts.timeout)
      : undefined;

    child.on("close", (code) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        resolve({ ok: false, code: code ?? 1, output: `timed out after ${opts?.timeout}ms` });
        return;
      }
      resolve({ ok: code === 0, code: code ?? 1 });
    });
    child.on("error", (err) => {
      if (timer) clearTimeout(timer);
      resolve({ ok: false, code: 127, output: err.message });
    });
  });
}

export class StreamingRunner implements CommandRunner {
  constructor(private readonly timeout = 600_000) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    console.log(chalk.dim(`  $ ${[command, ...args].join(" ")}`));
    return spawnStreaming(command, args, { timeout: this.timeout });
  }
}

/** Routes every command through sudo when `elevate` is set. */
export class ElevatedRunner implements CommandRunner {
  constructor(
    private readonly inner: CommandRunner,
    readonly elevate: boolean,
  ) {}

  run(command: string, args: string[]): Promise<CommandResult> {
    return this.elevate
      ? this.inner.run("sudo", [command, ...args])
      : this.inner.run(command, args);
  }
}

/** `command -v` over the search path captured in the runtime context. */
export class PathProbe implements Probe {
  constructor(private readonly searchPath: readonly string[]) {}

  async available(name: string): Promise<boolean> {
    if (name.includes("/")) return isExecutableFile(name);
    for (const dir of this.searchPath) {
      if (await isExecutableFile(join(dir, name))) return true;
    }
    return false;
  }
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
