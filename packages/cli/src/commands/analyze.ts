/**
 * CLI Analyze Command
 *
 * Runs one image and prompt through each selected vision tool in turn, so
 * providers can be compared side by side.
 *
 * @module cli/commands/analyze
 */

import { getLogger, isAgentToolsError } from "@agent-tools/core";
import type { ToolDescriptor } from "@agent-tools/tool";
import { getErrorMessage, isProviderError, type VisionUsage } from "@agent-tools/vision";
import { Command, InvalidArgumentError } from "commander";
import { type CliContext, eprintln, println } from "../context.js";
import { EXIT_CODES } from "./exit-codes.js";

export const DEFAULT_PROMPT = "Describe this image in detail";

interface AnalyzeOptions {
  tool: string[];
  model?: string;
  maxTokens?: number;
  json?: boolean;
}

export type AnalyzeOutcome =
  | {
      tool: string;
      ok: true;
      model: string;
      description: string;
      durationMs: number;
      usage?: VisionUsage;
    }
  | {
      tool: string;
      ok: false;
      error: { name: string; message: string; code?: number };
    };

/**
 * Helper to collect multiple option values into an array.
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Parse a positive integer option value.
 */
function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function describeError(error: unknown): { name: string; message: string; code?: number } {
  if (isAgentToolsError(error) || isProviderError(error)) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: getErrorMessage(error) };
}

/**
 * Instantiate and run one tool. Failures become outcomes rather than throws.
 */
async function runTool(
  ctx: CliContext,
  tool: ToolDescriptor,
  imagePath: string,
  prompt: string,
  options: AnalyzeOptions
): Promise<AnalyzeOutcome> {
  try {
    const ClientClass = await ctx.registry.getTool(tool.id);
    const client = ClientClass.fromEnv(ctx.env);
    const result = await client.analyzeImage(imagePath, prompt, {
      model: options.model,
      maxTokens: options.maxTokens,
    });
    return {
      tool: tool.id,
      ok: true,
      model: result.model,
      description: result.description,
      durationMs: result.durationMs,
      usage: result.usage,
    };
  } catch (error) {
    getLogger().debug("Tool failed", { tool: tool.id, error: getErrorMessage(error) });
    return { tool: tool.id, ok: false, error: describeError(error) };
  }
}

function printOutcome(ctx: CliContext, outcome: AnalyzeOutcome): void {
  const { chalk } = ctx;
  println(ctx, "=".repeat(60));
  if (outcome.ok) {
    println(ctx, chalk.bold(`[${outcome.tool} - ${outcome.model}]`));
    println(ctx, outcome.description);
    println(ctx);
    println(ctx, chalk.dim(`(Model: ${outcome.model}, ${outcome.durationMs}ms)`));
  } else {
    println(ctx, chalk.bold(`[${outcome.tool}]`));
    println(ctx, chalk.red(`❌ ${outcome.tool} failed: ${outcome.error.message}`));
  }
}

async function runAnalyze(
  ctx: CliContext,
  imagePath: string,
  prompt: string,
  options: AnalyzeOptions
): Promise<void> {
  const tools =
    options.tool.length > 0
      ? options.tool.map((id) => ctx.registry.getToolInfo(id))
      : ctx.registry.listTools({ onlyAvailable: true, env: ctx.env });

  if (tools.length === 0) {
    eprintln(ctx, ctx.chalk.red("No vision tools are configured. Run `agent-tools check`."));
    ctx.exitCode = EXIT_CODES.ERROR;
    return;
  }

  if (!options.json) {
    println(ctx, `Analyzing: ${imagePath}`);
    println(ctx, `Prompt: ${prompt}`);
  }

  const outcomes: AnalyzeOutcome[] = [];
  for (const tool of tools) {
    const outcome = await runTool(ctx, tool, imagePath, prompt, options);
    outcomes.push(outcome);
    if (!options.json) {
      printOutcome(ctx, outcome);
    }
  }

  if (options.json) {
    println(ctx, JSON.stringify({ image: imagePath, prompt, results: outcomes }, null, 2));
  }

  ctx.exitCode = outcomes.some((outcome) => outcome.ok) ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}

export function createAnalyzeCommand(ctx: CliContext): Command {
  return new Command("analyze")
    .description("Analyze an image with each configured vision tool")
    .argument("<image>", "Path to the image file")
    .argument("[prompt]", "Instruction for the model", DEFAULT_PROMPT)
    .option("-t, --tool <id>", "Tool to run (repeatable; default: every available tool)", collect, [])
    .option("-m, --model <model>", "Model to use instead of each tool's default")
    .option("--max-tokens <n>", "Maximum tokens in the response", parsePositiveInt)
    .option("--json", "Print results as JSON")
    .action(async (imagePath: string, prompt: string, options: AnalyzeOptions) => {
      await runAnalyze(ctx, imagePath, prompt, options);
    });
}
