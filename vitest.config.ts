import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/cli/**/*.test.ts"],
    environment: "node",
  },
});
