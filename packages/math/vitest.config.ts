import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@transcend/math",
    globals: true,
    environment: "node",
  },
});
