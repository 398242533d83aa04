import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/__tests__/**/*.test.ts",
      "packages/*/tests/**/*.test.ts",
    ],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
