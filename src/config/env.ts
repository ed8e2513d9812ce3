/**
 * @file Environment variable overrides (PORT, MIN, MAX, TIMEOUT)
 *
 * A variable that is unset or does not parse as a non-negative integer
 * leaves the underlying value alone rather than failing startup.
 */
import type { RawAppConfig } from "./types";

export type Env = Record<string, string | undefined>;

/** Parse a non-negative decimal integer, or return `fallback`. */
export function envInt(env: Env, name: string, fallback?: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return fallback;
  }
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : fallback;
}

/** Read the overrides the environment sets, as a partial raw config. */
export function configFromEnv(env: Env): RawAppConfig {
  return {
    pool: { min: envInt(env, "MIN"), max: envInt(env, "MAX"), timeoutMs: envInt(env, "TIMEOUT") },
    server: { port: envInt(env, "PORT") },
  };
}
