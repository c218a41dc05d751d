import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["aptctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
