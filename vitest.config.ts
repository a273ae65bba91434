import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cdk/**/__tests__/**/*.test.ts", "simulator/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
