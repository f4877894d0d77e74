import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/app/tests/**/*.test.ts"],
    environment: "node"
  }
})
