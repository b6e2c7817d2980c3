/**
 * CLI JSON Command
 *
 * Discovery summary for programmatic use. Only the JSON document goes to
 * stdout; logs stay on stderr.
 *
 * @module cli/commands/json
 */

import { Command } from "commander";
import { type CliContext, println } from "../context.js";
import { EXIT_CODES } from "./exit-codes.js";

export function createJsonCommand(ctx: CliContext): Command {
  return new Command("json").description("Print the tool discovery summary as JSON").action(() => {
    println(ctx, JSON.stringify(ctx.registry.discover(ctx.env), null, 2));
    ctx.exitCode = EXIT_CODES.SUCCESS;
  });
}
