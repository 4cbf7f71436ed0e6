import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "main.test.ts"],
    environment: "node",
  },
});
