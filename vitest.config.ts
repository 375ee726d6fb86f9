import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/src/**/*.{test,spec}.ts"],
    restoreMocks: true,
    testTimeout: 10_000,
  },
});
