import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "core",
    watch: false,
    environment: "node",
    include: ["tests/**/*.test.ts", "src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",
      clean: true,
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/bin.ts", "**/*.d.ts"],
    },
  },
});
