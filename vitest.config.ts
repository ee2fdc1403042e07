/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      enabled: false,
      exclude: ["src/frontend/main.tsx", "src/runtime/cli.ts"],
      include: ["src/**"],
      provider: "v8",
      reporter: ["text", "text-summary", "html"],
      reportsDirectory: "./coverage",
    },
    include: ["test/**/*.test.ts", "test/**/*.test.tsx"],
  },
});
