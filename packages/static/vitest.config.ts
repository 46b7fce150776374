import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "static",
    watch: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    hookTimeout: 30_000,
    testTimeout: 30_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",
      clean: true,
      include: ["src/**/*.ts"],
      exclude: ["src/bin.ts", "**/*.d.ts"],
    },
  },
});
