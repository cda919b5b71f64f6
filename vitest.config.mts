import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["packages/*/src/**/*.test.mts"],
    // forks keep the logger on a main thread, so records are written, not posted
    pool: "forks",
    restoreMocks: true,
    unstubEnvs: true,
    env: { LOG_LEVEL: "silent" },
  },
});
