import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * ANSI color codes for terminal output.
 */
const COLORS = {
  reset: "\x1b[0m",
  gray: "\x1b[90m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /**
   * Line sink (default: process.stderr).
   * Logs stay off stdout so command output can be piped.
   */
  output?: (line: string) => void;
}

/**
 * Colors are disabled when NO_COLOR or CI is set, or stderr is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stderr.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function formatData(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  // Error properties are not enumerable
  if (data instanceof Error) {
    return `${data.name}: ${data.message}`;
  }
  return JSON.stringify(data);
}

/**
 * Human-readable transport.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: false });
 * logger.addTransport(transport);
 * // [2026-01-05 10:00:00] [INFO ] (vision) Request completed {"durationMs":812}
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly output: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);
    const name = entry.context?.logger;
    const prefix = typeof name === "string" ? `(${name}) ` : "";

    let output = this.useColors
      ? `[${timestamp}] ${LEVEL_COLORS[entry.level]}[${level}]${COLORS.reset} ${prefix}${entry.message}`
      : `[${timestamp}] [${level}] ${prefix}${entry.message}`;

    if (entry.data !== undefined) {
      output += ` ${formatData(entry.data)}`;
    }

    this.output(output);
  }
}
