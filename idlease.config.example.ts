/**
 * @file Example config (copy to idlease.config.mjs / .ts and adjust)
 *
 * Environment variables PORT, MIN, MAX and TIMEOUT override these values;
 * CLI flags override both.
 */
import { defineConfig } from "./src/config";

export default defineConfig({
  pool: {
    min: 1,
    max: 1024,
    timeoutMs: 5000,
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
    cors: true,
  },
});
