import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text"],
      reportOnFailure: true,
      exclude: [
        "**/dist/**",
        "**/node_modules/**",
        "**/*.test.ts",
        "**/tests/**",
        "**/types.ts",
        "packages/**/index.ts",
        "**/*.config.ts",
      ],
      include: ["packages/shared/src/**/*.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    include: ["packages/shared/tests/**/*.test.ts"],
  },
});
