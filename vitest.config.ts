import { defineConfig } from "vitest/config";
import { resolve } from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["tests/setup.ts"],
    env: {
      LOG_LEVEL: "error",
      LOG_CONSOLE: "false",
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
