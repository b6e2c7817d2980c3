import { describe, expect, it } from "vitest";
import { displayEnvValue, isSensitiveVariable, maskValue } from "../mask.js";

describe("isSensitiveVariable", () => {
  it("should flag api keys and tokens", () => {
    expect(isSensitiveVariable("VENICE_API_KEY")).toBe(true);
    expect(isSensitiveVariable("GITHUB_TOKEN")).toBe(true);
  });

  it("should not flag host names", () => {
    expect(isSensitiveVariable("OLLAMA_HOST")).toBe(false);
  });
});

describe("maskValue", () => {
  it("should fully mask short values", () => {
    expect(maskValue("abcd")).toBe("***");
  });

  it("should keep the first and last two characters", () => {
    expect(maskValue("test-secret")).toBe("te*******et");
  });

  it("should cap the number of stars at eight", () => {
    expect(maskValue("a-much-longer-placeholder")).toBe("a-********er");
  });
});

describe("displayEnvValue", () => {
  it("should mask sensitive variables", () => {
    expect(displayEnvValue("VENICE_API_KEY", "test-secret")).toBe("te*******et");
  });

  it("should truncate long plain values", () => {
    expect(displayEnvValue("OLLAMA_HOST", "http://127.0.0.1:11434")).toBe(
      "http://127.0.0.1:114..."
    );
  });

  it("should leave short plain values untouched", () => {
    expect(displayEnvValue("OLLAMA_HOST", "http://ollama:11434")).toBe("http://ollama:11434");
  });
});
