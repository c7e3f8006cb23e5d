import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "forks",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 55,
      },
      exclude: [
        "src/cli.ts",
        "src/index.ts",
        "tests/helpers/**",
        "dist/**",
        "node_modules/**",
      ],
    },
  },
});
