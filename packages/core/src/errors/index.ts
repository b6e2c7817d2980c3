// ============================================
// Agent Tools Errors - Barrel Export
// ============================================

export {
  AgentToolsError,
  type AgentToolsErrorOptions,
  ConfigurationError,
  ImageReadError,
  isAgentToolsError,
  ToolNotFoundError,
} from "./types.js";
