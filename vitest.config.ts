import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    environment: "node",
    pool: "forks",
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
