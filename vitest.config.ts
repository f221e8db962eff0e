import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (relative: string) =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    testTimeout: 10000,
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@turnlab/types": workspace("./packages/types/src/index.ts"),
      "@turnlab/telemetry": workspace("./packages/telemetry/src/index.ts"),
      "@turnlab/analyzer": workspace("./packages/analyzer/src/index.ts"),
    },
  },
});
