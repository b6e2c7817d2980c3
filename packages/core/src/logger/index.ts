export type { CreateLoggerOptions } from "./factory.js";
export { createLogger, getLogger, resetLogger, setLogger } from "./factory.js";
export { Logger } from "./logger.js";
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export type { JsonTransportOptions } from "./transports/json.js";
export { JsonTransport } from "./transports/json.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
export { isLogLevel, LOG_LEVEL_PRIORITY } from "./types.js";
