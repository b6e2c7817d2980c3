import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packagesDir = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages export their emitted dist/ at run time; tests load the sources.
    alias: [
      {
        find: /^@agent-tools\/vision\/(ollama|venice)$/,
        replacement: `${packagesDir}/vision/src/$1.ts`,
      },
      {
        find: /^@agent-tools\/(shared|core|vision|tool)$/,
        replacement: `${packagesDir}/$1/src/index.ts`,
      },
    ],
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      NODE_ENV: "test",
    },
  },
});
