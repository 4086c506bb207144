import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["dock-batch/tests/**/*.spec.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
