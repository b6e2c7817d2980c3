// ============================================
// Agent Tools Registry
// ============================================

export { BUILTIN_TOOLS, ollamaVisionTool, veniceVisionTool } from "./builtin/index.js";
export { defineTool } from "./define.js";
export {
  clearDefaultRegistry,
  createToolRegistry,
  discover,
  getDefaultRegistry,
  getTool,
  getToolInfo,
  listTools,
  ToolRegistry,
} from "./registry.js";
export type { DiscoverySummary, ListToolsOptions, ToolDescriptor, ToolSummary } from "./types.js";
