import { BUILTIN_TOOLS, createToolRegistry } from "@agent-tools/tool";
import { describe, expect, it } from "vitest";
import { runCapture } from "../../test/helpers.js";

describe("list command", () => {
  const registry = createToolRegistry(BUILTIN_TOOLS);

  const expected = [
    "🛠️  Available Agent Tools",
    "",
    "Total: 2 tools (1 available)",
    "",
    "📦 vision.ollama (not configured)",
    "   Ollama Cloud vision analysis (free tier, preferred)",
    "   Class: OllamaVisionClient",
    "   Requires: OLLAMA_HOST",
    '   Example: OllamaVisionClient.fromEnv().analyzeImage("img.png", "Describe")',
    "",
    "📦 vision.venice (available)",
    "   Venice AI vision analysis (paid, reliable fallback)",
    "   Class: VeniceVisionClient",
    "   Requires: VENICE_API_KEY",
    '   Example: VeniceVisionClient.fromEnv().analyzeImage("img.png", "Describe")',
    "",
    "",
  ].join("\n");

  it("prints every tool with its availability", async () => {
    const run = await runCapture(["list"], { registry, env: { VENICE_API_KEY: "test-secret" } });

    expect(run.code).toBe(0);
    expect(run.stdout).toBe(expected);
    expect(run.stderr).toBe("");
  });

  it("is the default command", async () => {
    const run = await runCapture([], { registry, env: { VENICE_API_KEY: "test-secret" } });

    expect(run.code).toBe(0);
    expect(run.stdout).toBe(expected);
  });

  it("rejects unexpected arguments as a usage error", async () => {
    const run = await runCapture(["lsit"], { registry });

    expect(run.code).toBe(2);
    expect(run.stdout).toBe("");
    expect(run.stderr).toContain("too many arguments");
  });
});
