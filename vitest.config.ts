import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/test/**/*.spec.ts"],
    restoreMocks: true,
    watch: false,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
