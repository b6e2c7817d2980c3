import { ConfigurationError, type EnvSource, readEnv } from "@agent-tools/core";
import { createToolRegistry, defineTool, type ToolRegistry } from "@agent-tools/tool";
import { type AnalyzeImageOptions, type VisionClient, VisionResult } from "@agent-tools/vision";
import { beforeEach, describe, expect, it } from "vitest";
import { runCapture } from "../../test/helpers.js";

interface RecordedCall {
  imagePath: string;
  prompt: string;
  options?: AnalyzeImageOptions;
}

const calls: RecordedCall[] = [];

class WorkingClient implements VisionClient {
  static readonly PROVIDER = "working";
  static readonly DEFAULT_MODEL = "work-1";
  readonly provider = "working";
  readonly defaultModel = "work-1";

  static fromEnv(env: EnvSource = {}): WorkingClient {
    if (!readEnv("WORKING_KEY", env)) {
      throw new ConfigurationError("Invalid working configuration: WORKING_KEY is not set");
    }
    return new WorkingClient();
  }

  async analyzeImage(
    imagePath: string,
    prompt: string,
    options?: AnalyzeImageOptions
  ): Promise<VisionResult> {
    calls.push({ imagePath, prompt, options });
    return new VisionResult({
      description: "A photo of a cat",
      rawResponse: {},
      model: options?.model ?? this.defaultModel,
      provider: this.provider,
      durationMs: 42,
    });
  }
}

class FailingClient implements VisionClient {
  static readonly PROVIDER = "failing";
  static readonly DEFAULT_MODEL = "fail-1";
  readonly provider = "failing";
  readonly defaultModel = "fail-1";

  static fromEnv(): FailingClient {
    return new FailingClient();
  }

  analyzeImage(): Promise<VisionResult> {
    return Promise.reject(new Error("upstream exploded"));
  }
}

function createRegistry(): ToolRegistry {
  return createToolRegistry([
    defineTool({
      id: "fake.working",
      name: "Working",
      description: "Always answers",
      modulePath: "./working.js",
      className: "WorkingClient",
      envVars: ["WORKING_KEY"],
      example: "",
      resolve: async () => WorkingClient,
    }),
    defineTool({
      id: "fake.failing",
      name: "Failing",
      description: "Always fails",
      modulePath: "./failing.js",
      className: "FailingClient",
      envVars: ["FAILING_KEY"],
      example: "",
      resolve: async () => FailingClient,
    }),
  ]);
}

describe("analyze command", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    calls.length = 0;
    registry = createRegistry();
  });

  it("runs every available tool with the default prompt", async () => {
    const run = await runCapture(["analyze", "cat.png"], {
      registry,
      env: { WORKING_KEY: "test-secret" },
    });

    expect(run.code).toBe(0);
    expect(calls).toEqual([
      {
        imagePath: "cat.png",
        prompt: "Describe this image in detail",
        options: { model: undefined, maxTokens: undefined },
      },
    ]);
    expect(run.stdout).toBe(
      [
        "Analyzing: cat.png",
        "Prompt: Describe this image in detail",
        "=".repeat(60),
        "[fake.working - work-1]",
        "A photo of a cat",
        "",
        "(Model: work-1, 42ms)",
        "",
      ].join("\n")
    );
  });

  it("reports failures per tool and succeeds if any tool succeeded", async () => {
    const run = await runCapture(
      ["analyze", "cat.png", "What animal?", "--tool", "fake.failing", "--tool", "fake.working"],
      { registry, env: { WORKING_KEY: "test-secret" } }
    );

    expect(run.code).toBe(0);
    expect(run.stdout).toBe(
      [
        "Analyzing: cat.png",
        "Prompt: What animal?",
        "=".repeat(60),
        "[fake.failing]",
        "❌ fake.failing failed: upstream exploded",
        "=".repeat(60),
        "[fake.working - work-1]",
        "A photo of a cat",
        "",
        "(Model: work-1, 42ms)",
        "",
      ].join("\n")
    );
  });

  it("exits 1 when every tool fails", async () => {
    const run = await runCapture(["analyze", "cat.png", "--tool", "fake.working", "--json"], {
      registry,
      env: {},
    });

    expect(run.code).toBe(1);
    expect(JSON.parse(run.stdout)).toEqual({
      image: "cat.png",
      prompt: "Describe this image in detail",
      results: [
        {
          tool: "fake.working",
          ok: false,
          error: {
            name: "ConfigurationError",
            message: "Invalid working configuration: WORKING_KEY is not set",
            code: 3002,
          },
        },
      ],
    });
  });

  it("passes model and max tokens through and prints JSON", async () => {
    const run = await runCapture(
      ["analyze", "cat.png", "--model", "work-2", "--max-tokens", "128", "--json"],
      { registry, env: { WORKING_KEY: "test-secret" } }
    );

    expect(run.code).toBe(0);
    expect(calls[0]?.options).toEqual({ model: "work-2", maxTokens: 128 });
    expect(JSON.parse(run.stdout)).toEqual({
      image: "cat.png",
      prompt: "Describe this image in detail",
      results: [
        {
          tool: "fake.working",
          ok: true,
          model: "work-2",
          description: "A photo of a cat",
          durationMs: 42,
        },
      ],
    });
  });

  it("fails when no tool is configured", async () => {
    const run = await runCapture(["analyze", "cat.png"], { registry, env: {} });

    expect(run.code).toBe(1);
    expect(run.stdout).toBe("");
    expect(run.stderr).toBe("No vision tools are configured. Run `agent-tools check`.\n");
  });

  it("treats an unknown tool id as a usage error", async () => {
    const run = await runCapture(["analyze", "cat.png", "--tool", "vision.nope"], { registry });

    expect(run.code).toBe(2);
    expect(run.stderr).toBe(
      "Error: Tool 'vision.nope' not found. Available: fake.working, fake.failing\n"
    );
  });

  it("rejects a non-numeric --max-tokens", async () => {
    const run = await runCapture(["analyze", "cat.png", "--max-tokens", "lots"], { registry });

    expect(run.code).toBe(2);
    expect(run.stderr).toContain("Expected a positive integer.");
    expect(calls).toEqual([]);
  });

  it("requires an image argument", async () => {
    const run = await runCapture(["analyze"], { registry });

    expect(run.code).toBe(2);
    expect(run.stderr).toContain("missing required argument 'image'");
  });
});
