/**
 * Errors raised by vision providers, classified by HTTP status or, for
 * transport failures, by message.
 *
 * @module @agent-tools/vision/errors
 */

import { ErrorCode } from "@agent-tools/shared";

export type ProviderErrorCategory =
  | "credential_invalid"
  | "rate_limited"
  | "timeout"
  | "network_error"
  | "api_error"
  | "invalid_response"
  | "unknown";

export interface ErrorClassification {
  code: ErrorCode;
  category: ProviderErrorCategory;
  /** Whether a later attempt could succeed. Informational: nothing retries. */
  retryable: boolean;
}

export interface ProviderErrorContext {
  provider?: string;
  model?: string;
  /** From the provider's `x-request-id` response header */
  requestId?: string;
  timestamp?: Date;
}

export interface ProviderErrorOptions extends ErrorClassification {
  statusCode?: number;
  cause?: Error;
  context?: ProviderErrorContext;
}

/**
 * A vision provider rejected or failed a request.
 */
export class ProviderError extends Error {
  readonly code: ErrorCode;
  readonly category: ProviderErrorCategory;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly context: ProviderErrorContext;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.code = options.code;
    this.category = options.category;
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
    this.context = { ...options.context, timestamp: options.context?.timestamp ?? new Date() };
  }

  /**
   * Copy of this error with provider/model details merged into its context.
   */
  withContext(context: ProviderErrorContext): ProviderError {
    return new ProviderError(this.message, {
      code: this.code,
      category: this.category,
      retryable: this.retryable,
      statusCode: this.statusCode,
      cause: this.cause instanceof Error ? this.cause : undefined,
      context: { ...this.context, ...context },
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: ErrorCode[this.code],
      category: this.category,
      retryable: this.retryable,
      statusCode: this.statusCode,
      context: { ...this.context, timestamp: this.context.timestamp?.toISOString() },
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * The request did not complete within its deadline.
 */
export class ProviderTimeoutError extends ProviderError {
  readonly timeoutMs: number;

  constructor(
    message: string,
    options: { timeoutMs: number; cause?: Error; context?: ProviderErrorContext }
  ) {
    super(message, {
      code: ErrorCode.TIMEOUT,
      category: "timeout",
      retryable: true,
      cause: options.cause,
      context: options.context,
    });
    this.name = "ProviderTimeoutError";
    this.timeoutMs = options.timeoutMs;
  }

  override withContext(context: ProviderErrorContext): ProviderTimeoutError {
    return new ProviderTimeoutError(this.message, {
      timeoutMs: this.timeoutMs,
      cause: this.cause instanceof Error ? this.cause : undefined,
      context: { ...this.context, ...context },
    });
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

function classification(
  code: ErrorCode,
  category: ProviderErrorCategory,
  retryable: boolean
): ErrorClassification {
  return { code, category, retryable };
}

/**
 * @example
 * ```typescript
 * classifyHttpStatus(429);
 * // { code: ErrorCode.RATE_LIMITED, category: "rate_limited", retryable: true }
 * ```
 */
export function classifyHttpStatus(statusCode: number): ErrorClassification {
  switch (statusCode) {
    case 401:
    case 403:
      return classification(ErrorCode.CREDENTIAL_VALIDATION_FAILED, "credential_invalid", false);
    case 429:
      return classification(ErrorCode.RATE_LIMITED, "rate_limited", true);
    case 400:
    case 422:
      return classification(ErrorCode.INVALID_ARGUMENT, "api_error", false);
    case 404:
      return classification(ErrorCode.PROVIDER_NOT_FOUND, "api_error", false);
    case 502:
    case 503:
      return classification(ErrorCode.SERVICE_UNAVAILABLE, "api_error", true);
    case 504:
      return classification(ErrorCode.TIMEOUT, "timeout", true);
  }
  if (statusCode >= 500) {
    return classification(ErrorCode.API_ERROR, "api_error", true);
  }
  if (statusCode >= 400) {
    return classification(ErrorCode.API_ERROR, "api_error", false);
  }
  return classification(ErrorCode.UNKNOWN, "unknown", false);
}

const TIMEOUT_PATTERN = /timeout|timed out|etimedout/i;
// undici reports refused and reset connections as "fetch failed"
const NETWORK_PATTERN = /fetch failed|network|econnrefused|econnreset|enotfound|socket|connection/i;

/**
 * Classify any thrown value: its HTTP status when it has one, otherwise
 * its name and message.
 */
export function classifyProviderError(error: unknown): ErrorClassification {
  if (error instanceof ProviderError) {
    return classification(error.code, error.category, error.retryable);
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    return classifyHttpStatus(statusCode);
  }

  const text = `${error instanceof Error ? error.name : ""} ${getErrorMessage(error)}`;
  if (TIMEOUT_PATTERN.test(text)) {
    return classification(ErrorCode.TIMEOUT, "timeout", true);
  }
  if (NETWORK_PATTERN.test(text)) {
    return classification(ErrorCode.NETWORK_ERROR, "network_error", true);
  }
  return classification(ErrorCode.UNKNOWN, "unknown", false);
}

/**
 * Normalize any thrown value into a ProviderError. A string is used as a
 * message prefix; an object is attached as context.
 *
 * @example
 * ```typescript
 * try {
 *   response = await fetch(url, init);
 * } catch (error) {
 *   throw createProviderError(error, "Ollama request failed");
 * }
 * ```
 */
export function createProviderError(
  error: unknown,
  contextOrPrefix?: string | ProviderErrorContext
): ProviderError {
  if (error instanceof ProviderError) {
    return typeof contextOrPrefix === "object" ? error.withContext(contextOrPrefix) : error;
  }

  const message = getErrorMessage(error);
  return new ProviderError(
    typeof contextOrPrefix === "string" ? `${contextOrPrefix}: ${message}` : message,
    {
      ...classifyProviderError(error),
      statusCode: getStatusCode(error),
      cause: error instanceof Error ? error : undefined,
      context: typeof contextOrPrefix === "object" ? contextOrPrefix : {},
    }
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.status === "number") {
    return error.status;
  }
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (isRecord(error) && typeof error.message === "string") {
    return error.message;
  }
  return "Unknown error";
}

/**
 * Whether a thrown value is an elapsed AbortSignal.timeout() or an abort.
 */
export function isTimeoutAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}
