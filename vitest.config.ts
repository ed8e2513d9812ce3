/**
 * @file Vitest testing framework configuration
 *
 * Globals are on so specs use describe/it/expect without imports; the node
 * environment is needed for the config loader specs that touch the file
 * system. Unit specs live beside their sources, end-to-end specs in spec/.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.{ts,tsx}", "spec/**/*.spec.ts"],
    setupFiles: [],
  },
});
