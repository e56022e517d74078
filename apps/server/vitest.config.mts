import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(fileURLToPath(new URL(".", import.meta.url)), "./src"),
    },
  },
  test: {
    environment: "node",
    globals: true,
    setupFiles: ["./vitest.setup.mts"],

    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],

    // One in-memory database per worker; keep files sequential
    pool: "forks",
    fileParallelism: false,
    isolate: true,

    testTimeout: 15_000,
    hookTimeout: 10_000,
    teardownTimeout: 5000,

    retry: isCI ? 1 : 0,

    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/lib/**"],
    },
  },
});
