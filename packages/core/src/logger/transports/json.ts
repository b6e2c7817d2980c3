import type { LogEntry, LogTransport } from "../types.js";

/**
 * Options for JsonTransport.
 */
export interface JsonTransportOptions {
  /** Custom output function (default: write to process.stderr) */
  output?: (line: string) => void;
}

/**
 * JSON transport for structured log output.
 * Outputs single-line JSON objects for each log entry.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const transport = new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2026-01-05T10:00:00.000Z","level":"info","message":"Hello"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const obj: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      obj.context = entry.context;
    }

    obj.message = entry.message;

    if (entry.data !== undefined) {
      obj.data = entry.data instanceof Error ? serializeError(entry.data) : entry.data;
    }

    if (entry.traceId) {
      obj.traceId = entry.traceId;
      obj.spanId = entry.spanId;
    }

    this.output(JSON.stringify(obj));
  }
}

/**
 * Errors have no enumerable own properties, so JSON.stringify drops them.
 */
function serializeError(error: Error): Record<string, unknown> {
  return { name: error.name, message: error.message };
}
