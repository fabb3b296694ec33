import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["extensions/*/src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    environment: "node",
    testTimeout: 20_000,
    restoreMocks: true,
  },
});
