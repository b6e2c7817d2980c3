/**
 * Error Severity Types
 *
 * Shared severity definitions for the error system.
 *
 * @module @agent-tools/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

/**
 * Error severity levels as string literals.
 */
export type ErrorSeverity = "low" | "medium" | "high" | "critical";

/**
 * Infers the appropriate severity level from an error code.
 *
 * - low: transient failures on the remote side
 * - medium: user-correctable (configuration, lookup, bad input)
 * - high: local I/O and credential rejection
 * - critical: internal faults
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.RATE_LIMITED:
    case ErrorCode.SERVICE_UNAVAILABLE:
    case ErrorCode.TIMEOUT:
    case ErrorCode.NETWORK_ERROR:
      return "low";

    case ErrorCode.API_ERROR:
    case ErrorCode.INVALID_RESPONSE:
    case ErrorCode.INVALID_ARGUMENT:
    case ErrorCode.CONFIG_MISSING:
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.PROVIDER_NOT_FOUND:
    case ErrorCode.TOOL_NOT_FOUND:
    case ErrorCode.TOOL_ALREADY_REGISTERED:
      return "medium";

    case ErrorCode.SYSTEM_IO_ERROR:
    case ErrorCode.CREDENTIAL_VALIDATION_FAILED:
      return "high";

    case ErrorCode.UNKNOWN:
    case ErrorCode.INTERNAL_ERROR:
      return "critical";

    default:
      return "high";
  }
}

