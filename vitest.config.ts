import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["jarcert/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
