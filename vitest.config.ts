import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["core", "std", "math"].map((pkg) => ({
      extends: `./packages/${pkg}/vitest.config.ts`,
      root: `./packages/${pkg}`,
      test: {
        testTimeout: 30000,
        hookTimeout: 15000,
      },
    })),

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
