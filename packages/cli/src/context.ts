import type { EnvSource } from "@agent-tools/core";
import { getDefaultRegistry, type ToolRegistry } from "@agent-tools/tool";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import { EXIT_CODES, type ExitCode } from "./commands/exit-codes.js";

/**
 * Everything a command needs from the outside world.
 */
export interface CliContext {
  env: EnvSource;
  registry: ToolRegistry;
  chalk: ChalkInstance;
  /** Write raw text to standard output */
  stdout: (text: string) => void;
  /** Write raw text to standard error */
  stderr: (text: string) => void;
  /** Set by the command that ran */
  exitCode: ExitCode;
}

export interface CliOptions {
  /** Environment (default: process.env) */
  env?: EnvSource;
  /** Tool registry (default: the built-in registry) */
  registry?: ToolRegistry;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Force colours on or off (default: chalk's terminal detection) */
  colors?: boolean;
}

export function createCliContext(options: CliOptions = {}): CliContext {
  let colorChalk = chalk;
  if (options.colors !== undefined) {
    colorChalk = new Chalk({ level: options.colors ? 1 : 0 });
  }

  return {
    env: options.env ?? process.env,
    registry: options.registry ?? getDefaultRegistry(),
    chalk: colorChalk,
    stdout: options.stdout ?? ((text) => process.stdout.write(text)),
    stderr: options.stderr ?? ((text) => process.stderr.write(text)),
    exitCode: EXIT_CODES.SUCCESS,
  };
}

/**
 * Write one line to standard output.
 */
export function println(ctx: CliContext, line = ""): void {
  ctx.stdout(`${line}\n`);
}

/**
 * Write one line to standard error.
 */
export function eprintln(ctx: CliContext, line = ""): void {
  ctx.stderr(`${line}\n`);
}
