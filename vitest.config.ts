import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      LOG_FORMAT: "json",
      DB_NAME: "clinic_booking_test",
      DB_USER: "test",
      DB_PASSWORD: "test-password",
      JWT_ACCESS_SECRET: "test-secret-test-secret-test-secret",
      SWAGGER_ENABLED: "false",
    },
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "src"),
    },
  },
});
