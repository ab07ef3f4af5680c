import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "adapters/*/adapter/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
