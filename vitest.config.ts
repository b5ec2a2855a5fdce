import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/*"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.d.ts", "packages/types/src/**"],
      thresholds: process.env.CI
        ? {
            functions: 90,
            branches: 85,
            lines: 90,
            statements: 90,
          }
        : undefined,
    },
  },
});
