import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // CLI tests start a tsx process per case
    testTimeout: 20000,
  },
});
