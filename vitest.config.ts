import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],
    testTimeout: 15000,
    // Read by src/config/env.ts when it is first imported
    env: {
      NODE_ENV: "test",
      DATABASE_PATH: ":memory:",
      LOG_FILE: "",
      LOG_LEVEL: "error",
      COMMON_HF_ENDPOINT: "http://hub.test",
      API_HF_AUTH_PATH: "/api/datasets/%s/auth-check",
      API_HF_TIMEOUT_SECONDS: "1",
      ADMIN_API_KEY: "test-admin-key-123456",
    },
  },
});
