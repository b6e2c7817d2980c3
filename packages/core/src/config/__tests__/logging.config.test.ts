import { describe, expect, it } from "vitest";
import { getLoggingConfig } from "../logging.config.js";

describe("getLoggingConfig", () => {
  it("defaults to warn level text output", () => {
    expect(getLoggingConfig({})).toEqual({ level: "warn", json: false });
  });

  it("reads level and format overrides", () => {
    expect(
      getLoggingConfig({ AGENT_TOOLS_LOG_LEVEL: "DEBUG", AGENT_TOOLS_LOG_FORMAT: "json" })
    ).toEqual({ level: "debug", json: true });
  });

  it("ignores unknown levels", () => {
    expect(getLoggingConfig({ AGENT_TOOLS_LOG_LEVEL: "verbose" }).level).toBe("warn");
  });

  it("starts from quiet test defaults under NODE_ENV=test", () => {
    expect(getLoggingConfig({ NODE_ENV: "test" })).toEqual({
      level: "error",
      colors: false,
      json: false,
    });
  });
});
