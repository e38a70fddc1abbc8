import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["sales-report/src/**/*.test.ts"],
    environment: "node"
  }
});
