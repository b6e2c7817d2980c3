/**
 * CLI List Command
 *
 * Human-readable listing of every registered tool.
 *
 * @module cli/commands/list
 */

import type { DiscoverySummary } from "@agent-tools/tool";
import type { ChalkInstance } from "chalk";
import { Command } from "commander";
import { type CliContext, println } from "../context.js";
import { EXIT_CODES } from "./exit-codes.js";

/**
 * Render a discovery summary as text lines.
 */
export function formatToolList(summary: DiscoverySummary, chalk: ChalkInstance): string[] {
  const lines = [
    chalk.bold("🛠️  Available Agent Tools"),
    "",
    `Total: ${summary.total} tools (${summary.available} available)`,
    "",
  ];

  for (const tool of summary.tools) {
    const status = tool.available ? chalk.green("available") : chalk.yellow("not configured");
    lines.push(
      `📦 ${chalk.bold(tool.id)} (${status})`,
      `   ${tool.description}`,
      `   Class: ${tool.className}`,
      `   Requires: ${tool.requiresEnv.length > 0 ? tool.requiresEnv.join(", ") : "nothing"}`,
      `   Example: ${chalk.dim(tool.example)}`,
      ""
    );
  }

  return lines;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command("list").description("List registered tools (default)").action(() => {
    for (const line of formatToolList(ctx.registry.discover(ctx.env), ctx.chalk)) {
      println(ctx, line);
    }
    ctx.exitCode = EXIT_CODES.SUCCESS;
  });
}
