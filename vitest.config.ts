import {defineConfig} from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    include: ["packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    reporters: ["default"],
    testTimeout: 30_000,
    env: {
      VOUCH_PRESET: "mainnet",
    },
  },
});
