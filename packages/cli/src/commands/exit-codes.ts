/**
 * Process exit codes:
 * - 0: Success
 * - 1: General error
 * - 2: Usage/argument error
 *
 * @module cli/commands/exit-codes
 */

import { ToolNotFoundError } from "@agent-tools/core";
import { CommanderError } from "commander";

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error thrown while parsing or running a command to an exit code.
 */
export function exitCodeFromError(error: unknown): ExitCode {
  // commander reports help and --version as exit code 0
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof ToolNotFoundError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}
