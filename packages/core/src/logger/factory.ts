import type { EnvSource } from "../config/env.js";
import { getLoggingConfig } from "../config/logging.config.js";
import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'agent-tools') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** If true, output one JSON object per line (default: false) */
  json?: boolean;
  /** Enable colored console output (default: auto-detect) */
  colors?: boolean;
  /** Line sink shared by the transports (default: process.stderr) */
  output?: (line: string) => void;
}

/**
 * Factory function to create a Logger with a console or JSON transport.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'vision', level: 'debug' });
 *
 * // JSON lines for log shippers
 * const logger = createLogger({ name: 'vision', json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "agent-tools" },
  });

  if (options.json) {
    logger.addTransport(new JsonTransport({ output: options.output }));
  } else {
    logger.addTransport(new ConsoleTransport({ colors: options.colors, output: options.output }));
  }

  return logger;
}

let defaultLogger: Logger | null = null;

/**
 * Get the process-wide logger, created on first use from
 * `AGENT_TOOLS_LOG_LEVEL` / `AGENT_TOOLS_LOG_FORMAT`.
 */
export function getLogger(env: EnvSource = process.env): Logger {
  if (!defaultLogger) {
    const config = getLoggingConfig(env);
    defaultLogger = createLogger({ level: config.level, json: config.json, colors: config.colors });
  }
  return defaultLogger;
}

/**
 * Replace the process-wide logger (e.g. from a CLI entry point).
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Drop the process-wide logger so the next getLogger() re-reads the environment.
 */
export function resetLogger(): void {
  defaultLogger = null;
}
