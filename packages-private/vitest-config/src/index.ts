import type { UserConfig } from "vitest/config";

export const baseConfig = {
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    restoreMocks: true,
  },
} satisfies UserConfig;
