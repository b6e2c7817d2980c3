import { defineTool } from "../define.js";

export const veniceVisionTool = defineTool({
  id: "vision.venice",
  name: "Venice Vision",
  description: "Venice AI vision analysis (paid, reliable fallback)",
  modulePath: "@agent-tools/vision/venice",
  className: "VeniceVisionClient",
  envVars: ["VENICE_API_KEY"],
  example: 'VeniceVisionClient.fromEnv().analyzeImage("img.png", "Describe")',
  resolve: async () => (await import("@agent-tools/vision/venice")).VeniceVisionClient,
});
