import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    // Storages touch the file system and Node's Web Crypto; IndexedDB is
    // provided per test file by fake-indexeddb.
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
      include: ["src/**/*.ts"],
      exclude: [
        "src/models/**",
        "src/testing/**",
        "src/index.ts",
        "**/*.test.ts",
      ],
    },
  },
});
