import type { EnvSource } from "@agent-tools/core";
import type { ToolRegistry } from "@agent-tools/tool";
import type { ExitCode } from "../commands/exit-codes.js";
import { runCli } from "../program.js";

export interface CliRun {
  code: ExitCode;
  stdout: string;
  stderr: string;
}

/**
 * Run the CLI in-process with captured output and colours off.
 */
export async function runCapture(
  args: string[],
  options: { env?: EnvSource; registry?: ToolRegistry } = {}
): Promise<CliRun> {
  let stdout = "";
  let stderr = "";
  const code = await runCli(args, {
    env: options.env ?? {},
    registry: options.registry,
    colors: false,
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
  });
  return { code, stdout, stderr };
}
