// ============================================
// Agent Tools Error Codes
// ============================================

/**
 * Centralized error codes for agent-tools.
 * Error code ranges:
 * - 1xxx: General/System errors
 * - 2xxx: Network/API errors
 * - 3xxx: Configuration and credential errors
 * - 4xxx: Provider errors
 * - 5xxx: Tool errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  INVALID_ARGUMENT = 1002,
  TIMEOUT = 1004,
  SYSTEM_IO_ERROR = 1005,

  // Network/API Errors (2xxx)
  NETWORK_ERROR = 2001,
  API_ERROR = 2002,
  RATE_LIMITED = 2003,
  SERVICE_UNAVAILABLE = 2004,
  INVALID_RESPONSE = 2005,

  // Configuration / Credential Errors (3xxx)
  CONFIG_MISSING = 3001,
  CONFIG_INVALID = 3002,
  CREDENTIAL_VALIDATION_FAILED = 3004,

  // Provider Errors (4xxx)
  PROVIDER_NOT_FOUND = 4001,

  // Tool Errors (5xxx)
  TOOL_NOT_FOUND = 5001,
  TOOL_ALREADY_REGISTERED = 5003,
}
