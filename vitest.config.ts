import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    // The large-file scenario moves ~70 MiB through the in-memory transport
    testTimeout: 30000,
  },
});
