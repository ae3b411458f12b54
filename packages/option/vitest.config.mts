import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "option",
    globals: true,
    include: ["src/**/*.test.mts"],
  },
});
