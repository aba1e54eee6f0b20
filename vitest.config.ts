import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to dist/ at run time; tests load their sources.
const source = (entry: string): string => fileURLToPath(new URL(entry, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@threadline/sdk": source("./packages/sdk/src/index.ts"),
      "@threadline/harness": source("./packages/harness/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
  },
});
