import { ErrorCode } from "@agent-tools/shared";
import type { z } from "zod";
import { ConfigurationError } from "../errors/types.js";

/**
 * Anything shaped like `process.env`.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface GetEnvOptions {
  /** Value used when the variable is unset or blank */
  default?: string;
  /** Throw ConfigurationError when the variable is unset or blank */
  required?: boolean;
  /** Environment to read (default: process.env) */
  env?: EnvSource;
}

/**
 * Read a variable, treating blank values as unset.
 */
export function readEnv(key: string, env: EnvSource = process.env): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Whether a variable is set to a non-blank value. Reads only.
 */
export function hasEnv(key: string, env: EnvSource = process.env): boolean {
  return readEnv(key, env) !== undefined;
}

/**
 * Get an environment variable with optional default and required check.
 *
 * @throws ConfigurationError if `required` and the variable is unset
 *
 * @example
 * ```typescript
 * const apiKey = getEnv("VENICE_API_KEY", { required: true });
 * const host = getEnv("OLLAMA_HOST", { default: "http://127.0.0.1:11434" });
 * ```
 */
export function getEnv(key: string, options: GetEnvOptions & { required: true }): string;
export function getEnv(key: string, options: GetEnvOptions & { default: string }): string;
export function getEnv(key: string, options?: GetEnvOptions): string | undefined;
export function getEnv(key: string, options: GetEnvOptions = {}): string | undefined {
  const value = readEnv(key, options.env) ?? options.default;
  if (options.required && value === undefined) {
    throw new ConfigurationError(`Required environment variable ${key} is not set`, {
      code: ErrorCode.CONFIG_MISSING,
      variables: [key],
    });
  }
  return value;
}

/**
 * Validate environment variables against a zod object schema.
 *
 * Blank values are treated as unset so `.default()` and required checks
 * behave the same for `FOO=` and a missing `FOO`.
 *
 * @param schema - Object schema keyed by variable name
 * @param env - Environment to read
 * @param label - What is being configured, used in the error message
 * @throws ConfigurationError listing every offending variable
 */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: EnvSource = process.env,
  label = "configuration"
): z.output<T> {
  const values: Record<string, string | undefined> = {};
  for (const key of Object.keys(env)) {
    values[key] = readEnv(key, env);
  }

  const result = schema.safeParse(values);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues;
  const variables = [...new Set(issues.map((issue) => issue.path.join(".")))];
  const missing = issues.every(
    (issue) => issue.code === "invalid_type" && issue.received === "undefined"
  );

  const details = issues
    .map((issue) =>
      issue.code === "invalid_type" && issue.received === "undefined"
        ? `${issue.path.join(".")} is not set`
        : `${issue.path.join(".")}: ${issue.message}`
    )
    .join("; ");

  throw new ConfigurationError(`Invalid ${label}: ${details}`, {
    code: missing ? ErrorCode.CONFIG_MISSING : ErrorCode.CONFIG_INVALID,
    variables,
  });
}
