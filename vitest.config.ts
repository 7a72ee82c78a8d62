import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    setupFiles: ["./src/test/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["**/*.test.ts", "**/*.test-utils.ts", "**/*.state-mock.ts", "src/test/**"],
    },
  },
});
