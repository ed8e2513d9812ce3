/**
 * @file Config types: single source for ServerOptions and AppConfig
 */
import type { Clock } from "../coordination/clock";
import type { Logger } from "../allocator";
import type { PoolOptions } from "../pool";

/** `true` allows any origin; methods are always GET/HEAD since the surface is read-only. */
export type CorsOptions =
  | boolean
  | {
      origin?: string | string[];
      allowHeaders?: string[];
      maxAge?: number;
      /** Needs an explicit origin: browsers refuse credentials with `*`. */
      credentials?: boolean;
    };

export type ServerOptions = {
  port?: number;
  host?: string;
  cors?: CorsOptions;
  /** Coordination: injectable clock for lease expiry */
  clock?: Clock;
  /** Where the allocator reports expired heartbeats and faults (default: console) */
  logger?: Logger;
};

/** Fully resolved runtime configuration. Bounds are fixed for the process lifetime. */
export type AppConfig = {
  pool: PoolOptions;
  server: ServerOptions;
};

/** Authoring shape for config files; every field optional. */
export type RawAppConfig = {
  pool?: Partial<PoolOptions>;
  server?: ServerOptions;
};
