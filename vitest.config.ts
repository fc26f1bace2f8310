import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // keep test output readable; spies still see every call
    env: { LOG_LEVEL: "error" },
  },
});
