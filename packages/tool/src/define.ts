import { type EnvSource, hasEnv } from "@agent-tools/core";
import type { VisionClientClass } from "@agent-tools/vision";
import type { ToolDescriptor } from "./types.js";

/**
 * Build a frozen tool descriptor. Without an explicit `isAvailable`, a tool is
 * available when every one of its `envVars` is set to a non-blank value.
 *
 * @example
 * ```typescript
 * const tool = defineTool({
 *   id: "vision.local",
 *   name: "Local Vision",
 *   description: "Vision on a workstation GPU",
 *   modulePath: "./local-vision.js",
 *   className: "LocalVisionClient",
 *   envVars: ["LOCAL_VISION_URL"],
 *   example: 'LocalVisionClient.fromEnv().analyzeImage("img.png", "Describe")',
 *   resolve: async () => (await import("./local-vision.js")).LocalVisionClient,
 * });
 * ```
 */
export function defineTool<TClass extends VisionClientClass>(config: {
  id: string;
  name: string;
  description: string;
  modulePath: string;
  className: string;
  envVars: readonly string[];
  example: string;
  isAvailable?: (env: EnvSource) => boolean;
  resolve: () => Promise<TClass>;
}): ToolDescriptor<TClass> {
  const envVars = Object.freeze([...config.envVars]);
  const check = config.isAvailable ?? ((env: EnvSource) => envVars.every((key) => hasEnv(key, env)));

  return Object.freeze({
    id: config.id,
    name: config.name,
    description: config.description,
    modulePath: config.modulePath,
    className: config.className,
    envVars,
    example: config.example,
    isAvailable: (env: EnvSource = process.env) => check(env),
    resolve: config.resolve,
  });
}
