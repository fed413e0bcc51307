import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov", "json-summary"],
    },
    // Workspace packages resolve to their TypeScript sources, no build needed
    alias: {
      "@urikit/uri": fileURLToPath(new URL("./packages/uri/src/index.ts", import.meta.url)),
      "@urikit/vfs": fileURLToPath(new URL("./packages/vfs/src/index.ts", import.meta.url)),
    },
  },
});
