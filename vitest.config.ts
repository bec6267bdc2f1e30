import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/repositories/**/*Live.ts",
        "src/services/**/*Live.ts",
        "src/cli/**/*.ts"
      ],
      exclude: [
        "src/**/*.test.ts",
        "src/__tests__/**",
        "src/main.ts",
        "src/layers.ts",
        "src/domain/**/*.ts"
      ]
    }
  }
})
