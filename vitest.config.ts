import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/holdem-eval/test/**/*.test.ts"],
    environment: "node"
  }
});
