/**
 * @file Build entry catalog - entry points and the packages left external
 *
 * Single source of truth for the Vite library build. Every entry runs on
 * Node.js; the allocator core itself has no Node-specific imports.
 *
 * Adding a new entry:
 * ```typescript
 * "my-module/index": {
 *   path: "src/my-module/index.ts",
 *   description: "My module description",
 *   external: ["some-dep"], // optional external dependencies
 * }
 * ```
 */

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Optional description of the entry
   */
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

/**
 * Catalog of all build entries
 */
export const entries: EntryCatalog = {
  index: {
    path: "src/index.ts",
    description: "Main library entry point (allocator, pool, clocks)",
    external: ["hono", "@hono/node-server"],
  },

  "http-server/index": {
    path: "src/http-server/index.ts",
    description: "HTTP server implementation",
    external: ["hono", "hono/cors", "@hono/node-server"],
  },

  "config/index": {
    path: "src/config/index.ts",
    description: "Config loading and validation",
  },

  "cli/index": {
    path: "src/cli/main.tsx",
    description: "Command line interface",
    external: ["ink", "ink-spinner", "react", "react/jsx-runtime"],
  },
};

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();

  // Node.js built-ins
  externals.add(/node:.+/);

  for (const config of Object.values(entries)) {
    if (config.external) {
      config.external.forEach((ext) => externals.add(ext));
    }
  }

  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  const viteEntries: Record<string, string> = {};

  for (const [name, config] of Object.entries(entries)) {
    viteEntries[name] = config.path;
  }

  return viteEntries;
}
