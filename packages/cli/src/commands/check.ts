/**
 * CLI Check Command
 *
 * Verifies the environment variables every registered tool needs.
 *
 * @module cli/commands/check
 */

import { type EnvSource, readEnv } from "@agent-tools/core";
import { displayEnvValue } from "@agent-tools/shared";
import type { ToolDescriptor } from "@agent-tools/tool";
import { DEFAULT_OLLAMA_HOST } from "@agent-tools/vision/ollama";
import type { ChalkInstance } from "chalk";
import { Command } from "commander";
import { type CliContext, println } from "../context.js";
import { EXIT_CODES } from "./exit-codes.js";

/**
 * Values a client falls back to when the variable is unset.
 */
const ENV_DEFAULTS: Readonly<Record<string, string>> = {
  OLLAMA_HOST: DEFAULT_OLLAMA_HOST,
};

export interface EnvCheck {
  name: string;
  /** Tools that need this variable */
  tools: string[];
  value?: string;
  defaultValue?: string;
}

/**
 * One check per distinct variable, in tool registration order.
 */
export function collectEnvChecks(tools: readonly ToolDescriptor[], env: EnvSource): EnvCheck[] {
  const checks = new Map<string, EnvCheck>();

  for (const tool of tools) {
    for (const name of tool.envVars) {
      const existing = checks.get(name);
      if (existing) {
        existing.tools.push(tool.name);
        continue;
      }
      checks.set(name, {
        name,
        tools: [tool.name],
        value: readEnv(name, env),
        defaultValue: ENV_DEFAULTS[name],
      });
    }
  }

  return [...checks.values()];
}

export function formatEnvChecks(checks: readonly EnvCheck[], chalk: ChalkInstance): string[] {
  const lines = [chalk.bold("🔍 Environment Check"), ""];

  for (const check of checks) {
    const purpose = check.tools.join(", ");
    if (check.value !== undefined) {
      lines.push(
        `  ✅ ${check.name}: ${displayEnvValue(check.name, check.value)}`,
        `     → ${purpose} ${chalk.green("ready")}`
      );
    } else {
      lines.push(
        `  ❌ ${check.name}: ${chalk.red("not set")}`,
        `     → ${purpose} ${chalk.yellow("unavailable")}`
      );
      if (check.defaultValue !== undefined) {
        lines.push(`     (default would be: ${check.defaultValue})`);
      }
    }
    lines.push("");
  }

  return lines;
}

export function createCheckCommand(ctx: CliContext): Command {
  return new Command("check")
    .description("Check that the environment variables for each tool are set")
    .action(() => {
      const checks = collectEnvChecks(ctx.registry.listTools(), ctx.env);
      for (const line of formatEnvChecks(checks, ctx.chalk)) {
        println(ctx, line);
      }
      ctx.exitCode = checks.every((check) => check.value !== undefined)
        ? EXIT_CODES.SUCCESS
        : EXIT_CODES.ERROR;
    });
}
