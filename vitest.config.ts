import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/api/tests/**/*.test.ts"],
    restoreMocks: true
  }
});
