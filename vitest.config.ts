import { resolve } from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@nuctrack/track-core": resolve(root, "packages/track-core/src"),
      "@nuctrack/detector": resolve(root, "packages/detector/src")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"]
  }
});
