import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["typescript/src/**/*.test.ts", "tests/**/*.test.ts"],
  },
});
