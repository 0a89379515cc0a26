import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 2_000,
    restoreMocks: true,
  },
});
