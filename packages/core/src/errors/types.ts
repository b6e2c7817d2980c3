// ============================================
// Agent Tools Error Types
// ============================================

import { ErrorCode, type ErrorSeverity, inferSeverity } from "@agent-tools/shared";

/**
 * Options for creating an AgentToolsError.
 */
export interface AgentToolsErrorOptions {
  /** The underlying cause of this error */
  cause?: Error;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for agent-tools errors raised on the local side
 * (configuration, file access, registry lookups).
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class AgentToolsError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: AgentToolsErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "AgentToolsError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: ErrorCode[this.code],
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Missing or invalid environment setup. Surfaced immediately, never retried.
 */
export class ConfigurationError extends AgentToolsError {
  /** Environment variables involved, when known */
  public readonly variables: readonly string[];

  constructor(
    message: string,
    options: AgentToolsErrorOptions & { code?: ErrorCode; variables?: readonly string[] } = {}
  ) {
    super(message, options.code ?? ErrorCode.CONFIG_INVALID, options);
    this.name = "ConfigurationError";
    this.variables = options.variables ?? [];
  }
}

/**
 * A local image could not be read or is not a usable image.
 */
export class ImageReadError extends AgentToolsError {
  public readonly path: string;

  constructor(
    message: string,
    path: string,
    options: AgentToolsErrorOptions & { code?: ErrorCode } = {}
  ) {
    super(message, options.code ?? ErrorCode.SYSTEM_IO_ERROR, {
      ...options,
      context: { ...options.context, path },
    });
    this.name = "ImageReadError";
    this.path = path;
  }
}

/**
 * Unknown tool identifier.
 */
export class ToolNotFoundError extends AgentToolsError {
  public readonly toolId: string;
  public readonly knownIds: readonly string[];

  constructor(toolId: string, knownIds: readonly string[]) {
    super(
      `Tool '${toolId}' not found. Available: ${knownIds.length > 0 ? knownIds.join(", ") : "none"}`,
      ErrorCode.TOOL_NOT_FOUND,
      { context: { toolId, knownIds } }
    );
    this.name = "ToolNotFoundError";
    this.toolId = toolId;
    this.knownIds = knownIds;
  }
}

/**
 * Type guard for agent-tools errors.
 */
export function isAgentToolsError(error: unknown): error is AgentToolsError {
  return error instanceof AgentToolsError;
}
