import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/tests/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
