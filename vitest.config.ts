import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@ctxpath/core": fileURLToPath(
        new URL("./packages/core/src/index.ts", import.meta.url)
      ),
      "@ctxpath/tables": fileURLToPath(
        new URL("./packages/tables/src/index.ts", import.meta.url)
      )
    }
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node"
  }
});
