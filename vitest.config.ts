import { defineConfig } from "vitest/config";

/**
 * Tests parse with the native tree-sitter bindings, which are not
 * safe to share across worker threads; run each file in a forked process.
 */
export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    pool: "forks",
    testTimeout: 20000,
  },
});
