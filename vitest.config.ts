import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*_test.ts"],
    env: {
      LOG_LEVEL: "error",
      OTEL_ENABLED: "false",
      NODE_ENV: "test",
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    sequence: {
      shuffle: false,
      concurrent: false,
    },
    reporters: ["default"],
  },
});
