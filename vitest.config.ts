import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      ACTION_DELAY_MIN_MS: "0",
      ACTION_DELAY_MAX_MS: "0",
      STEP_TIMEOUT_MS: "300",
      EXTRACTION_TIMEOUT_MS: "300",
      EXTRACTION_POLL_MS: "10",
      READBACK_TIMEOUT_MS: "300",
      LOGIN_TIMEOUT_SECONDS: "5",
      SESSION_BLOB_SECRET: "test-secret-0123456789",
    },
    testTimeout: 10000,
  },
});
