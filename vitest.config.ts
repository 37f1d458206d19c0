import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/tests/**/*.test.ts"],
    exclude: ["**/fixtures/**", "**/node_modules/**"],
    testTimeout: 10_000,
    env: { LOG_LEVEL: "silent", NODE_ENV: "test" },
  },
});
