import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    env: {
      NEWS_REACTION_LOG_LEVEL: "silent",
    },
  },
})
