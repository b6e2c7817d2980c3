import { defineTool } from "../define.js";

export const ollamaVisionTool = defineTool({
  id: "vision.ollama",
  name: "Ollama Vision",
  description: "Ollama Cloud vision analysis (free tier, preferred)",
  modulePath: "@agent-tools/vision/ollama",
  className: "OllamaVisionClient",
  envVars: ["OLLAMA_HOST"],
  example: 'OllamaVisionClient.fromEnv().analyzeImage("img.png", "Describe")',
  resolve: async () => (await import("@agent-tools/vision/ollama")).OllamaVisionClient,
});
