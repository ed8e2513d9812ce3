/**
 * @file Public HTTP server entry (barrel)
 */
export { createApp } from "./app";
export { startServer } from "./start";
export { toWirePayload, isErrorPayload } from "./wire";
export type { StartServerOptions, RunningServer } from "./start";
export type { LeasePayload, LeaseErrorPayload, WirePayload } from "./wire";
export type { ServerOptions, AppConfig, CorsOptions } from "./types";
