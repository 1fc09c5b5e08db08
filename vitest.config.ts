import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts", "apps/*/src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "dist/**"],
    // native addon (@napi-rs/image)
    pool: "forks",
    testTimeout: 10_000,
  },
})
