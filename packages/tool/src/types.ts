import type { EnvSource } from "@agent-tools/core";
import type { VisionClientClass } from "@agent-tools/vision";

/**
 * A registered tool: metadata, an availability check that only reads the
 * environment, and a deferred loader for the tool's client class.
 */
export interface ToolDescriptor<TClass extends VisionClientClass = VisionClientClass> {
  /** Dotted identifier, unique per registry (e.g. "vision.ollama") */
  readonly id: string;
  /** Human-readable name */
  readonly name: string;
  readonly description: string;
  /** Module the class is loaded from */
  readonly modulePath: string;
  /** Exported class name within modulePath */
  readonly className: string;
  /** Environment variables the tool needs */
  readonly envVars: readonly string[];
  /** Usage snippet */
  readonly example: string;
  /** Whether the tool is configured. Never instantiates anything. */
  isAvailable(env?: EnvSource): boolean;
  /** Load the client class without instantiating it */
  resolve(): Promise<TClass>;
}

export interface ListToolsOptions {
  /** Only return tools whose availability check passes (default: false) */
  onlyAvailable?: boolean;
  /** Environment to check availability against (default: process.env) */
  env?: EnvSource;
}

/**
 * Serializable view of one tool, as reported by discover().
 */
export interface ToolSummary {
  id: string;
  name: string;
  description: string;
  module: string;
  className: string;
  requiresEnv: string[];
  available: boolean;
  example: string;
}

export interface DiscoverySummary {
  total: number;
  available: number;
  tools: ToolSummary[];
}
