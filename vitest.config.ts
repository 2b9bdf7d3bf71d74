import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules/**"],
    environment: "node",
    globals: true,
  },
  resolve: {
    alias: {
      "@": rootDir,
    },
  },
});
