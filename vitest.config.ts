import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@bitpack/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@bitpack/schema": fileURLToPath(new URL("./packages/schema/src/index.ts", import.meta.url)),
    },
  },
});
