/**
 * Patterns that indicate sensitive environment variables.
 * Variables matching these will have their values masked.
 */
const SENSITIVE_PATTERNS = [/KEY/i, /SECRET/i, /TOKEN/i, /PASSWORD/i, /CREDENTIAL/i, /AUTH/i];

/** Longest value shown verbatim before truncation */
const MAX_DISPLAY_LENGTH = 20;

/**
 * Check if a variable name indicates sensitive data
 */
export function isSensitiveVariable(name: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Mask a sensitive value
 */
export function maskValue(value: string): string {
  if (value.length <= 4) {
    return "***";
  }
  // Show first 2 and last 2 characters for longer values
  return `${value.slice(0, 2)}${"*".repeat(Math.min(value.length - 4, 8))}${value.slice(-2)}`;
}

/**
 * Format an environment value for display: secrets are masked,
 * long values truncated.
 */
export function displayEnvValue(name: string, value: string): string {
  if (isSensitiveVariable(name)) {
    return maskValue(value);
  }
  return value.length > MAX_DISPLAY_LENGTH ? `${value.slice(0, MAX_DISPLAY_LENGTH)}...` : value;
}
