/**
 * @file Config normalization + validation (raw -> AppConfig)
 */
import type { AppConfig, RawAppConfig, ServerOptions } from "./types";
import type { PoolOptions } from "../pool";
import { ConfigError } from "./errors";
import { hasMethods, isObject } from "../util/is-object";

export const DEFAULT_POOL: PoolOptions = { min: 1, max: 65535, timeoutMs: 3000 };
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";

/** Defaults used when nothing else sets a value. */
export function defaultConfig(): AppConfig {
  return { pool: { ...DEFAULT_POOL }, server: { port: DEFAULT_PORT, host: DEFAULT_HOST } };
}

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: RawAppConfig): RawAppConfig {
  return x;
}

type ValidationResult = { ok: true; errors: [] } | { ok: false; errors: string[] };

function isNonNegativeInt(x: unknown): x is number {
  return typeof x === "number" && Number.isSafeInteger(x) && x >= 0;
}

function validatePool(pool: unknown, errors: string[]) {
  if (pool === undefined) {
    return;
  }
  if (!isObject(pool)) {
    errors.push("pool: must be an object with { min, max, timeoutMs }");
    return;
  }
  for (const key of ["min", "max"] as const) {
    if (pool[key] !== undefined && !isNonNegativeInt(pool[key])) {
      errors.push(`pool.${key}: must be a non-negative integer`);
    }
  }
  if (pool.timeoutMs !== undefined && !(isNonNegativeInt(pool.timeoutMs) && pool.timeoutMs > 0)) {
    errors.push("pool.timeoutMs: must be a positive integer (ms)");
  }
  if (isNonNegativeInt(pool.min) && isNonNegativeInt(pool.max) && pool.min > pool.max) {
    errors.push("pool: min must not exceed max");
  }
}

function isStringList(x: unknown): x is string[] {
  return Array.isArray(x) && x.every((v) => typeof v === "string" && v.length > 0);
}

const CORS_KEYS = ["origin", "allowHeaders", "maxAge", "credentials"];

function validateCors(cors: unknown, errors: string[]) {
  if (cors === undefined || typeof cors === "boolean") {
    return;
  }
  if (!isObject(cors)) {
    errors.push("server.cors: must be a boolean or an options object");
    return;
  }
  for (const key of Object.keys(cors)) {
    if (!CORS_KEYS.includes(key)) {
      errors.push(`server.cors.${key}: unknown option (lease routes are GET-only)`);
    }
  }
  const { origin } = cors;
  if (origin !== undefined && !(typeof origin === "string" && origin.length > 0) && !isStringList(origin)) {
    errors.push("server.cors.origin: must be a non-empty string or a list of origins");
  }
  if (cors.allowHeaders !== undefined && !isStringList(cors.allowHeaders)) {
    errors.push("server.cors.allowHeaders: must be a list of header names");
  }
  if (cors.maxAge !== undefined && !isNonNegativeInt(cors.maxAge)) {
    errors.push("server.cors.maxAge: must be a non-negative integer (seconds)");
  }
  if (cors.credentials !== undefined && typeof cors.credentials !== "boolean") {
    errors.push("server.cors.credentials: must be a boolean");
  }
  if (cors.credentials === true && (origin === undefined || origin === "*")) {
    errors.push("server.cors.credentials: requires an explicit origin, not '*'");
  }
}

function validateServer(server: unknown, errors: string[]) {
  if (server === undefined) {
    return;
  }
  if (!isObject(server)) {
    errors.push("server: must be an object");
    return;
  }
  if (server.port !== undefined && !(isNonNegativeInt(server.port) && server.port <= 65535)) {
    errors.push("server.port: must be an integer in 0..65535");
  }
  if (server.host !== undefined && (typeof server.host !== "string" || server.host.length === 0)) {
    errors.push("server.host: must be a non-empty string");
  }
  validateCors(server.cors, errors);
  if (server.clock !== undefined && !hasMethods(server.clock, "now")) {
    errors.push("server.clock: must provide now()");
  }
  if (server.logger !== undefined && !hasMethods(server.logger, "warn", "error")) {
    errors.push("server.logger: must provide warn() and error()");
  }
}

/** Validate a raw config object; returns a list of errors instead of throwing. */
export function validateRawConfig(raw: unknown): ValidationResult {
  if (!isObject(raw)) {
    return { ok: false, errors: ["config: must be an object (JS/TS module export)"] };
  }
  const errors: string[] = [];
  validatePool(raw.pool, errors);
  validateServer(raw.server, errors);
  for (const key of Object.keys(raw)) {
    if (key !== "pool" && key !== "server") {
      errors.push(`${key}: unknown config key`);
    }
  }
  return errors.length === 0 ? { ok: true, errors: [] } : { ok: false, errors };
}

function isRawAppConfig(raw: unknown): raw is RawAppConfig {
  return validateRawConfig(raw).ok;
}

/** Layer `over` on top of `base`; undefined fields in `over` keep the base value. */
export function mergeConfig(base: AppConfig, over: RawAppConfig): AppConfig {
  const pool: PoolOptions = {
    min: over.pool?.min ?? base.pool.min,
    max: over.pool?.max ?? base.pool.max,
    timeoutMs: over.pool?.timeoutMs ?? base.pool.timeoutMs,
  };
  const server: ServerOptions = { ...base.server };
  for (const [k, v] of Object.entries(over.server ?? {})) {
    if (v !== undefined) {
      Object.assign(server, { [k]: v });
    }
  }
  return { pool, server };
}

/** Final cross-field check on a merged config. Throws ConfigError. */
export function assertAppConfig(cfg: AppConfig): AppConfig {
  const res = validateRawConfig(cfg);
  if (!res.ok) {
    throw new ConfigError(`Invalid config:\n- ${res.errors.join("\n- ")}`);
  }
  return cfg;
}

/** Normalize a raw config (typically a config module's default export) over `base`. */
export function normalizeConfig(raw: unknown, base: AppConfig = defaultConfig()): AppConfig {
  if (!isRawAppConfig(raw)) {
    const { errors } = validateRawConfig(raw);
    throw new ConfigError(`Invalid config:\n- ${errors.join("\n- ")}`);
  }
  return assertAppConfig(mergeConfig(base, raw));
}
