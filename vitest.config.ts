/**
 * @file Vitest testing framework configuration
 *
 * Unit specs live beside the sources (src/**\/*.spec.ts); cross-module
 * scenarios live under spec/.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
    setupFiles: [],
  },
});
