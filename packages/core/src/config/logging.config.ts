import type { LogLevel } from "../logger/types.js";
import { isLogLevel } from "../logger/types.js";
import type { EnvSource } from "./env.js";
import { readEnv } from "./env.js";

/**
 * Configuration for logging behavior.
 */
export interface LoggingConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Enable ANSI color codes in console output (undefined = auto-detect) */
  colors?: boolean;
  /** Output logs in JSON format */
  json: boolean;
}

/**
 * Library default: quiet unless something goes wrong.
 */
export const defaultLoggingConfig: LoggingConfig = {
  level: "warn",
  json: false,
};

/**
 * Test environment logging configuration.
 */
export const testLoggingConfig: LoggingConfig = {
  level: "error",
  colors: false,
  json: false,
};

/**
 * Resolve logging configuration from the environment.
 *
 * - `AGENT_TOOLS_LOG_LEVEL`: trace | debug | info | warn | error | fatal
 * - `AGENT_TOOLS_LOG_FORMAT`: text | json
 * - `NODE_ENV=test` starts from the test defaults
 *
 * Unrecognised values fall back to the defaults.
 */
export function getLoggingConfig(env: EnvSource = process.env): LoggingConfig {
  const base = readEnv("NODE_ENV", env) === "test" ? testLoggingConfig : defaultLoggingConfig;

  const level = readEnv("AGENT_TOOLS_LOG_LEVEL", env)?.toLowerCase();
  const format = readEnv("AGENT_TOOLS_LOG_FORMAT", env)?.toLowerCase();

  return {
    ...base,
    level: level !== undefined && isLogLevel(level) ? level : base.level,
    json: format === undefined ? base.json : format === "json",
  };
}
