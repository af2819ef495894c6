import type { CommandRunner } from "../exec.js";
import type { SoftResult } from "./types.js";

export async function runSoft(
  runner: CommandRunner,
  command: string,
  args: string[],
): Promise<SoftResult> {
  const { ok, code, output } = await runner.run(command, args);
  if (ok) return { ok: true };
  const detail = output ? `: ${output}` : "";
  return { ok: false, error: `${command} ${args.join(" ")} exited with code ${code}${detail}` };
}
