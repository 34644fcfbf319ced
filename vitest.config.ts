import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts", "src/test-utils.ts"],
      thresholds: {
        // Pricing math must stay fully exercised
        "src/fixed-point.ts": {
          statements: 95,
          branches: 90,
          functions: 100,
        },
        "src/pricing.ts": {
          statements: 95,
          branches: 85,
          functions: 100,
        },
      },
    },
  },
});
