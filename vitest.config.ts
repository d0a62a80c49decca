import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["handoverctl/test/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
