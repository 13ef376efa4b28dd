import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/meshwatch/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
