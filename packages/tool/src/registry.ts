// ============================================
// Tool Registry
// ============================================

import {
  AgentToolsError,
  type EnvSource,
  getLogger,
  ToolNotFoundError,
} from "@agent-tools/core";
import { ErrorCode } from "@agent-tools/shared";
import type { VisionClientClass } from "@agent-tools/vision";
import { BUILTIN_TOOLS } from "./builtin/index.js";
import type { DiscoverySummary, ListToolsOptions, ToolDescriptor, ToolSummary } from "./types.js";

/**
 * Registry of tool descriptors keyed by id, in registration order.
 *
 * Lookups never construct a client: getTool() hands back the class and the
 * caller decides when to call `fromEnv()`.
 *
 * @example
 * ```typescript
 * const registry = createToolRegistry(BUILTIN_TOOLS);
 *
 * for (const tool of registry.listTools({ onlyAvailable: true })) {
 *   console.log(`${tool.id}: ${tool.description}`);
 * }
 *
 * const OllamaVisionClient = await registry.getTool("vision.ollama");
 * const client = OllamaVisionClient.fromEnv();
 * ```
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  constructor(tools: Iterable<ToolDescriptor> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register a tool.
   *
   * @throws AgentToolsError (TOOL_ALREADY_REGISTERED) if the id is taken
   */
  register(tool: ToolDescriptor): void {
    if (this.tools.has(tool.id)) {
      throw new AgentToolsError(
        `Tool already registered: ${tool.id}`,
        ErrorCode.TOOL_ALREADY_REGISTERED,
        { context: { toolId: tool.id } }
      );
    }
    this.tools.set(tool.id, Object.isFrozen(tool) ? tool : Object.freeze({ ...tool }));
  }

  has(id: string): boolean {
    return this.tools.has(id);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Registered identifiers in registration order.
   */
  ids(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * List tools in registration order, optionally only the available ones.
   */
  listTools(options: ListToolsOptions = {}): ToolDescriptor[] {
    const tools = [...this.tools.values()];
    if (!options.onlyAvailable) {
      return tools;
    }
    const env = options.env ?? process.env;
    return tools.filter((tool) => tool.isAvailable(env));
  }

  /**
   * Get a tool's descriptor.
   *
   * @throws ToolNotFoundError if no tool has this id
   */
  getToolInfo(id: string): ToolDescriptor {
    const tool = this.tools.get(id);
    if (!tool) {
      throw new ToolNotFoundError(id, this.ids());
    }
    return tool;
  }

  /**
   * Load a tool's client class without instantiating it.
   *
   * @throws ToolNotFoundError if no tool has this id
   * @throws AgentToolsError (INTERNAL_ERROR) if the tool's module fails to load
   */
  async getTool(id: string): Promise<VisionClientClass> {
    const tool = this.getToolInfo(id);
    getLogger().debug("Resolving tool", { id, module: tool.modulePath });

    try {
      return await tool.resolve();
    } catch (error) {
      throw new AgentToolsError(
        `Failed to load ${tool.className} from ${tool.modulePath}`,
        ErrorCode.INTERNAL_ERROR,
        { cause: error instanceof Error ? error : undefined, context: { toolId: id } }
      );
    }
  }

  /**
   * Serializable summary of every tool and its current availability.
   * Recomputed on every call.
   */
  discover(env: EnvSource = process.env): DiscoverySummary {
    const tools = this.listTools().map((tool) => toToolSummary(tool, env));
    return {
      total: tools.length,
      available: tools.filter((tool) => tool.available).length,
      tools,
    };
  }
}

function toToolSummary(tool: ToolDescriptor, env: EnvSource): ToolSummary {
  return {
    id: tool.id,
    name: tool.name,
    description: tool.description,
    module: tool.modulePath,
    className: tool.className,
    requiresEnv: [...tool.envVars],
    available: tool.isAvailable(env),
    example: tool.example,
  };
}

/**
 * Create a registry holding the given tools.
 */
export function createToolRegistry(tools: Iterable<ToolDescriptor> = []): ToolRegistry {
  return new ToolRegistry(tools);
}

// =============================================================================
// Default Registry
// =============================================================================

let defaultRegistry: ToolRegistry | null = null;

/**
 * The process-wide registry, holding the built-in tools.
 */
export function getDefaultRegistry(): ToolRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createToolRegistry(BUILTIN_TOOLS);
  }
  return defaultRegistry;
}

/**
 * Drop the process-wide registry; the next call rebuilds it from the built-ins.
 */
export function clearDefaultRegistry(): void {
  defaultRegistry = null;
}

/** {@inheritDoc ToolRegistry.listTools} */
export function listTools(options?: ListToolsOptions): ToolDescriptor[] {
  return getDefaultRegistry().listTools(options);
}

/** {@inheritDoc ToolRegistry.getTool} */
export function getTool(id: string): Promise<VisionClientClass> {
  return getDefaultRegistry().getTool(id);
}

/** {@inheritDoc ToolRegistry.getToolInfo} */
export function getToolInfo(id: string): ToolDescriptor {
  return getDefaultRegistry().getToolInfo(id);
}

/** {@inheritDoc ToolRegistry.discover} */
export function discover(env?: EnvSource): DiscoverySummary {
  return getDefaultRegistry().discover(env);
}
