import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["workers/ts/src/**/*.test.ts"],
    env: { LOG_LEVEL: "silent" },
  },
});
