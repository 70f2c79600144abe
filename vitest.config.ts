import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.spec.ts", "tests/**/*.test.ts"],
    setupFiles: [path.resolve(root, "tests/setup.ts")],
    // PGlite boots a WASM Postgres per repository suite
    hookTimeout: 30_000,
    testTimeout: 15_000,
  },
  resolve: {
    alias: {
      "@": path.resolve(root, "src"),
    },
  },
});
