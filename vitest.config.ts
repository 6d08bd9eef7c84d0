import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    name: "credvault",
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@credvault/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url)
      ),
    },
  },
});
