/**
 * @file HTTP server config types (re-exported from config)
 */
export type { AppConfig, ServerOptions, CorsOptions } from "../config/types";
