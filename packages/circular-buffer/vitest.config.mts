import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "circular-buffer",
    globals: true,
    include: ["src/**/*.test.mts"],
  },
});
