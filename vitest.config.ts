import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["bazi/**/__tests__/**/*.test.ts", "oracle/**/__tests__/**/*.test.ts"],
    env: {
      BAZI_ORACLE_LOG_LEVEL: "silent",
    },
  },
});
