import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@src": path.resolve(__dirname, "src"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    root: ".",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "fatal",
      JWT_SECRET: "test-secret-for-unit-tests",
    },
  },
});
