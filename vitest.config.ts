// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "test/",
        "**/*.test.ts",
        "**/types.ts",
        "**/index.ts",
      ],
    },
    // Key generation and ML-KEM pre-keys are slow on CI machines
    testTimeout: 10000,
  },
});
