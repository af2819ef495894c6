#!/usr/bin/env node
import { Command } from "commander";
import { runInstaller } from "./commands/install.js";

const program = new Command();

program
  .name("ramalama-bootstrap")
  .description("Install RamaLama and the container runtime it needs")
  .version("0.1.0")
  .argument("[args...]", "get_* prints the shared install directory and exits")
  .option("-l, --local", "Install from the local source tree instead of downloading")
  .option("--dry-run", "Show what would be installed without making changes")
  .action(async (args: string[], opts: { local?: boolean; dryRun?: boolean }) => {
    process.exitCode = await runInstaller({ ...opts, args });
  });

await program.parseAsync();
