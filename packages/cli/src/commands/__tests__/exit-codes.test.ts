import { ToolNotFoundError } from "@agent-tools/core";
import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";
import { EXIT_CODES, exitCodeFromError } from "../exit-codes.js";

describe("exitCodeFromError", () => {
  it("should treat help and version output as success", () => {
    expect(exitCodeFromError(new CommanderError(0, "commander.version", "0.1.0"))).toBe(
      EXIT_CODES.SUCCESS
    );
  });

  it("should map commander parse errors to USAGE_ERROR", () => {
    expect(
      exitCodeFromError(
        new CommanderError(1, "commander.missingArgument", "missing required argument")
      )
    ).toBe(EXIT_CODES.USAGE_ERROR);
  });

  it("should map unknown tools to USAGE_ERROR", () => {
    expect(exitCodeFromError(new ToolNotFoundError("x", []))).toBe(EXIT_CODES.USAGE_ERROR);
  });

  it("should map anything else to ERROR", () => {
    expect(exitCodeFromError(new Error("boom"))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFromError("boom")).toBe(EXIT_CODES.ERROR);
  });
});
