import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@weekreport/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@weekreport/provider-github": path.join(rootDir, "packages/provider-github/src/index.ts"),
      "@weekreport/renderer-markdown": path.join(rootDir, "packages/renderer-markdown/src/index.ts"),
      "@weekreport/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});
