/**
 * @file Shared config API surface for CLI and server.
 */
import { resolveConfigPath } from "./resolve";
import { loadConfigModule } from "./loader";
import { configFromEnv, type Env } from "./env";
import { assertAppConfig, defaultConfig, mergeConfig, normalizeConfig } from "./normalize";
import type { AppConfig, RawAppConfig } from "./types";

export { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
export { loadConfigModule } from "./loader";
export { configFromEnv, envInt, type Env } from "./env";
export {
  normalizeConfig,
  validateRawConfig,
  mergeConfig,
  assertAppConfig,
  defineConfig,
  defaultConfig,
  DEFAULT_POOL,
  DEFAULT_PORT,
  DEFAULT_HOST,
} from "./normalize";
export { ConfigError } from "./errors";
export type { AppConfig, RawAppConfig, ServerOptions, CorsOptions } from "./types";

export type LoadAppConfigOptions = {
  /** Explicit config path; when absent, ./idlease.config.* is used if it exists. */
  configPath?: string;
  env?: Env;
  /** Highest-precedence values, e.g. CLI flags. */
  overrides?: RawAppConfig;
};

/** Resolve defaults <- config file <- environment <- overrides into one AppConfig. */
export async function loadAppConfig(opts: LoadAppConfigOptions = {}): Promise<AppConfig> {
  const fromFile = await (async () => {
    if (opts.configPath) {
      return normalizeConfig(await loadConfigModule(opts.configPath));
    }
    const found = await resolveConfigPath();
    return found ? normalizeConfig(await loadConfigModule(found)) : defaultConfig();
  })();
  const withEnv = mergeConfig(fromFile, configFromEnv(opts.env ?? {}));
  return assertAppConfig(mergeConfig(withEnv, opts.overrides ?? {}));
}

/** Human-readable one-liner of the effective pool and listen settings. */
export function describeConfig(cfg: AppConfig): string {
  return `ids ${cfg.pool.min}-${cfg.pool.max}, lease ${cfg.pool.timeoutMs}ms, listen ${cfg.server.host ?? "0.0.0.0"}:${
    cfg.server.port ?? 3000
  }`;
}
