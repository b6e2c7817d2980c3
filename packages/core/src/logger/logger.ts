import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Logger with multi-transport support, level filtering, and child logger creation.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'debug' });
 * logger.addTransport(new ConsoleTransport());
 *
 * const clientLogger = logger.child({ provider: 'ollama' });
 * clientLogger.debug('Sending request', { model: 'kimi-k2.5:cloud' });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Start a timer for measuring duration.
   * @param label - Label for the timer (used in log output)
   */
  time(label: string): TimerResult {
    const start = performance.now();
    let duration = 0;

    return {
      get duration() {
        return duration;
      },
      end: (message?: string, data?: Record<string, unknown>) => {
        duration = performance.now() - start;
        this.log("debug", message ?? `${label} completed`, {
          ...data,
          label,
          durationMs: Math.round(duration),
        });
      },
      stop: () => {
        duration = performance.now() - start;
        return duration;
      },
    };
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Create a child logger with merged context.
   * Child shares transports with its parent and starts at the parent's level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...this.getTraceContext(),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  /**
   * Extract trace context from OpenTelemetry active span.
   */
  private getTraceContext(): { traceId?: string; spanId?: string } {
    const span = trace.getSpan(context.active());
    if (span) {
      const ctx = span.spanContext();
      return { traceId: ctx.traceId, spanId: ctx.spanId };
    }
    return {};
  }
}
