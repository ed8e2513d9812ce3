/**
 * @file Vite build configuration
 */

import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import dts from "vite-plugin-dts";
import { getViteEntries, getAllExternals } from "./build.entries";
import type { Plugin } from "vite";
export default defineConfig({
  plugins: [
    react(),
    dts({
      entryRoot: "src",
      outDir: "dist",
      include: ["src"],
      exclude: ["**/*.spec.*", "spec", "node_modules", "dist"],
      tsconfigPath: "tsconfig.json",
      rollupTypes: false,
    }),
  ] as Plugin[],
  build: {
    outDir: "dist",
    target: "node20",
    lib: {
      entry: getViteEntries(),
      formats: ["es"],
    },
    rollupOptions: {
      external: getAllExternals(),
    },
  },
});
