import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/__tests__/**/*.test.ts",
      "services/*/src/**/__tests__/**/*.test.ts",
      "services/*/src/tests/**/*.test.ts",
    ],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
