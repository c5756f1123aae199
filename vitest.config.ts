import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/*/src/**/*.test.ts"],
    watch: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["services/*/src/**/*.ts"],
      exclude: ["services/*/src/index.ts"],
    },
  },
});
