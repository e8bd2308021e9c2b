import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      COMMUNITY_LOG_LEVEL: "silent",
    },
  },
});
