import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/test/**/*.test.ts"],
    pool: "forks",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
