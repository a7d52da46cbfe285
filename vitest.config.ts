import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
  resolve: {
    alias: {
      "@": resolve(root, "apps/server/src"),
    },
  },
});
