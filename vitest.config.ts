import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 15_000,
    hookTimeout: 15_000,
    // Tests bind real loopback ports and spawn processes; run files one at a time.
    fileParallelism: false,
  },
});
