import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@transcend/std",
    globals: true,
    environment: "node",
  },
});
