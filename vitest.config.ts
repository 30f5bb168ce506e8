import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources so tests need no build.
    alias: {
      "@itl/compiler": fileURLToPath(new URL("./packages/compiler/src/index.ts", import.meta.url)),
      "@itl/language-server": fileURLToPath(new URL("./packages/language-server/src/api.ts", import.meta.url)),
    },
  },
});
