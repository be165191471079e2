import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["scripts/tests/**/*.test.ts"],
    testTimeout: 30000,
  },
});
