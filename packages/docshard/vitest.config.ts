import { defineConfig, mergeConfig } from "vitest/config";
// Relative so the config bundler inlines it; a linked workspace package is loaded by Node untranspiled.
import { baseConfig } from "../../packages-private/vitest-config/src/index.js";

export default defineConfig(
  mergeConfig(baseConfig, {
    test: {
      name: "docshard",
    },
  }),
);
