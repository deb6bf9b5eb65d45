import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources; no build needed.
    alias: {
      "@localized-docs/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@localized-docs/config": fileURLToPath(new URL("./packages/config/src/index.ts", import.meta.url)),
    },
  },
});
