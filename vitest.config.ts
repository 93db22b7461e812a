import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_SILENT: "true",
    },
    fileParallelism: false,
    testTimeout: 30000,
    passWithNoTests: false,
  },
});
