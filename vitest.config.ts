import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["adb-wizard/tests/**/*.test.ts"],
    environment: "node",
    setupFiles: ["adb-wizard/tests/setup.ts"],
    restoreMocks: true,
  },
});
