import * as fs from "node:fs";
import * as path from "node:path";
import { ErrorCode } from "@agent-tools/shared";
import dotenv from "dotenv";
import { ConfigurationError } from "../errors/types.js";

const DOTENV_FILE_NAME = ".env";

/**
 * Find the nearest `.env` by searching up from startDir to the filesystem root.
 *
 * @returns Path to the file, or undefined if none exists
 */
export function findDotenvFile(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    const candidate = path.join(currentDir, DOTENV_FILE_NAME);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

export interface LoadDotenvOptions {
  /** Explicit file to load; skips the upward search */
  path?: string;
  /** Directory the search starts from (default: process.cwd()) */
  cwd?: string;
  /** Environment to populate (default: process.env) */
  env?: Record<string, string | undefined>;
}

/**
 * Load variables from a `.env` file into the environment.
 * Variables that are already set are never overridden.
 *
 * @returns The file that was loaded, or undefined when none was found
 * @throws ConfigurationError if the file exists but cannot be read
 */
export function loadDotenv(options: LoadDotenvOptions = {}): string | undefined {
  const file = options.path ?? findDotenvFile(options.cwd);
  if (!file) {
    return undefined;
  }

  let contents: Buffer;
  try {
    contents = fs.readFileSync(file);
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${file}`, {
      code: ErrorCode.CONFIG_INVALID,
      cause: error instanceof Error ? error : undefined,
      context: { path: file },
    });
  }

  const target = options.env ?? process.env;
  for (const [key, value] of Object.entries(dotenv.parse(contents))) {
    if (target[key] === undefined) {
      target[key] = value;
    }
  }

  return file;
}
