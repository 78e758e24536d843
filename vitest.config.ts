import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    // Global teardown to clean up test-temp directory
    globalSetup: ["tests/globalSetup.ts"],
  },
});
