import { describe, expect, it } from "vitest";
import { ErrorCode } from "../codes.js";
import { inferSeverity } from "../severity.js";

describe("inferSeverity", () => {
  it("should treat remote hiccups as low severity", () => {
    expect(inferSeverity(ErrorCode.RATE_LIMITED)).toBe("low");
    expect(inferSeverity(ErrorCode.TIMEOUT)).toBe("low");
  });

  it("should treat configuration and lookup problems as medium", () => {
    expect(inferSeverity(ErrorCode.CONFIG_MISSING)).toBe("medium");
    expect(inferSeverity(ErrorCode.TOOL_NOT_FOUND)).toBe("medium");
  });

  it("should treat local I/O failures as high", () => {
    expect(inferSeverity(ErrorCode.SYSTEM_IO_ERROR)).toBe("high");
  });

  it("should treat internal faults as critical", () => {
    expect(inferSeverity(ErrorCode.INTERNAL_ERROR)).toBe("critical");
  });
});
