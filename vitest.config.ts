import { defineConfig } from "vitest/config";

// biome-ignore lint/style/noDefaultExport: vitest expects a default export
export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    globals: true,
    testTimeout: 10_000,
    coverage: {
      reportsDirectory: "./test/coverage",
      provider: "v8",
      reportOnFailure: true,
    },
  },
});
