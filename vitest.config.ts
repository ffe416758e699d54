import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "node",
    pool: "threads",
    globals: true,
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    coverage: {
      provider: "v8" as const,
      reporter: ["text", "json", "html", "lcov"],
      include: ["src/**"],
      exclude: ["**/*.d.ts", "src/index.ts"],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },
  },
});
