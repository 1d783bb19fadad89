import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      HEALGATE_LOG: "silent",
    },
    testTimeout: 10_000,
  },
});
