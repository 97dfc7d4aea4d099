import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    hookTimeout: 10000,
    globals: false,
    environment: "node",
  },
});
