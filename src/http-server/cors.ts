/**
 * @file CORS policy for the lease endpoints
 */
import type { Hono } from "hono";
import { cors as honoCors } from "hono/cors";
import type { CorsOptions } from "./types";

/** Every lease route is a GET; preflights never advertise a write method. */
export const CORS_METHODS = ["GET", "HEAD"];

type HonoCorsOptions = NonNullable<Parameters<typeof honoCors>[0]>;

/** Translate the configured policy into hono/cors options; null when disabled. */
export function toHonoCorsOptions(cors?: CorsOptions): HonoCorsOptions | null {
  if (!cors) {
    return null;
  }
  const opts: HonoCorsOptions = { origin: "*", allowMethods: [...CORS_METHODS] };
  if (cors === true) {
    return opts;
  }
  if (cors.origin !== undefined) {
    opts.origin = cors.origin;
  }
  if (cors.allowHeaders !== undefined) {
    opts.allowHeaders = cors.allowHeaders;
  }
  if (cors.maxAge !== undefined) {
    opts.maxAge = cors.maxAge;
  }
  if (cors.credentials !== undefined) {
    opts.credentials = cors.credentials;
  }
  return opts;
}

/** Mount CORS middleware when `cors` is `true` or an options object. */
export function applyCors(app: Hono, cors?: CorsOptions) {
  const opts = toHonoCorsOptions(cors);
  if (opts) {
    app.use("*", honoCors(opts));
  }
}
