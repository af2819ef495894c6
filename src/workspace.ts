import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import chalk from "chalk";
import { errorMessage } from "./errors.js";

export interface Workspace {
  readonly path: string;
  /** Starts removal in the background and returns immediately. Idempotent. */
  dispose(): void;
  /** Settles once a started removal has finished; undefined before dispose(). */
  readonly removed: Promise<void> | undefined;
}

class TempWorkspace implements Workspace {
  private removal: Promise<void> | undefined;

  constructor(readonly path: string) {}

  get removed(): Promise<void> | undefined {
    return this.removal;
  }

  dispose(): void {
    if (this.removal) return;
    this.removal = rm(this.path, { recursive: true, force: true }).catch(
      (err: unknown) => {
        console.log(chalk.dim(`Could not remove ${this.path}: ${errorMessage(err)}`));
      },
    );
  }
}

export async function createWorkspace(tmpRoot: string): Promise<Workspace> {
  const path = await mkdtemp(join(tmpRoot, "ramalama-bootstrap-"));
  return new TempWorkspace(path);
}
