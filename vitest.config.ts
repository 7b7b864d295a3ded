import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@casekeeper/shared": workspace("./packages/shared/src/index.ts"),
      "@casekeeper/case": workspace("./packages/case/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"]
  }
});
