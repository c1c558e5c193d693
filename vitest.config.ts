import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    // CLI suites spawn tsx and real handler processes.
    testTimeout: 20_000,
  },
});
