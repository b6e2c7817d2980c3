import type { ToolDescriptor } from "../types.js";
import { ollamaVisionTool } from "./vision-ollama.js";
import { veniceVisionTool } from "./vision-venice.js";

export { ollamaVisionTool } from "./vision-ollama.js";
export { veniceVisionTool } from "./vision-venice.js";

/**
 * Built-in tools in preference order.
 */
export const BUILTIN_TOOLS: readonly ToolDescriptor[] = [ollamaVisionTool, veniceVisionTool];
