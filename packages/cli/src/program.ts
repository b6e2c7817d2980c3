/**
 * agent-tools command line
 *
 * @module cli/program
 */

import { createLogger, getLoggingConfig, setLogger } from "@agent-tools/core";
import { Command, CommanderError } from "commander";
import { createAnalyzeCommand } from "./commands/analyze.js";
import { createCheckCommand } from "./commands/check.js";
import { EXIT_CODES, type ExitCode, exitCodeFromError } from "./commands/exit-codes.js";
import { createJsonCommand } from "./commands/json.js";
import { createListCommand } from "./commands/list.js";
import { type CliContext, type CliOptions, createCliContext, eprintln } from "./context.js";
import { version } from "./version.js";

/**
 * Build the command tree. Commander never exits the process; errors surface
 * as CommanderError from parseAsync().
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("agent-tools")
    .description("Discover, check and run agent tools")
    .version(version)
    .option("-v, --verbose", "Log debug output to stderr")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout(text),
      writeErr: (text) => ctx.stderr(text),
      outputError: (text, write) => write(ctx.chalk.red(text)),
    })
    .hook("preAction", (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        const config = getLoggingConfig(ctx.env);
        setLogger(createLogger({ level: "debug", json: config.json, colors: config.colors }));
      }
    });

  const commands = [
    createListCommand(ctx),
    createJsonCommand(ctx),
    createCheckCommand(ctx),
    createAnalyzeCommand(ctx),
  ];
  for (const command of commands) {
    command.copyInheritedSettings(program);
    program.addCommand(command, { isDefault: command.name() === "list" });
  }

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 *
 * @returns The process exit code
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<ExitCode> {
  const ctx = createCliContext(options);
  const program = createProgram(ctx);

  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (error) {
    const code = exitCodeFromError(error);
    // commander has already printed its own message
    if (code !== EXIT_CODES.SUCCESS && !(error instanceof CommanderError)) {
      eprintln(ctx, ctx.chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    }
    return code;
  }

  return ctx.exitCode;
}
