import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "peekable",
    globals: true,
    include: ["src/**/*.test.mts"],
  },
});
