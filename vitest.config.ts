import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    setupFiles: ["./server/src/test/setup.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
      JWT_SECRET: "test-secret-for-vitest",
      SITE_URL: "http://localhost:3001",
      PAYMENT_BASE_URL: "https://payments.test/v1",
      PAYMENT_SECRET_KEY: "test-secret",
      PAYMENT_WEBHOOK_SECRET: "",
      PAYMENT_TIMEOUT_MS: "200",
    },
  },
});
