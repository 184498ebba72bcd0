import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/test/**/*.test.ts", "utils/test/**/*.test.ts"],
    globals: false,
    environment: "node",
  },
});
