import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": rootDir,
    },
  },
  test: {
    include: [
      "lib/**/__tests__/**/*.test.ts",
      "app/**/__tests__/**/*.test.ts",
    ],
    environment: "node",
    coverage: {
      provider: "v8",
      include: ["lib/**/*.ts", "app/**/*.ts"],
      exclude: ["**/__tests__/**"],
    },
  },
});
