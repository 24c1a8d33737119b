import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@transcend/core",
    globals: true,
    environment: "node",
  },
});
