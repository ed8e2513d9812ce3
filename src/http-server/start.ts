/**
 * @file Server boot from a normalized config
 */
import { serve } from "@hono/node-server";
import type { AddressInfo } from "node:net";
import { createAllocator, type Allocator } from "../allocator";
import { createApp } from "./app";
import type { AppConfig } from "./types";

export type StartServerOptions = {
  /** Suppress the "listening" line (the CLI status view prints its own). */
  quiet?: boolean;
};

export type RunningServer = {
  app: ReturnType<typeof createApp>;
  allocator: Allocator;
  port: number;
  host: string;
  close(): Promise<void>;
};

/** Build the allocator and app from config and listen on server.host:server.port. */
export async function startServer(cfg: AppConfig, opts?: StartServerOptions): Promise<RunningServer> {
  const allocator = createAllocator({ pool: cfg.pool, clock: cfg.server?.clock, logger: cfg.server?.logger });
  const app = createApp(allocator, cfg.server);
  const host = cfg.server?.host ?? "0.0.0.0";
  const info = await new Promise<{ server: ReturnType<typeof serve>; addr: AddressInfo }>((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port: cfg.server?.port ?? 3000, hostname: host }, (addr) => {
      server.off("error", reject);
      resolve({ server, addr });
    });
    // bind failures (EADDRINUSE, EACCES) arrive as an error event, never as the listening callback
    server.once("error", reject);
  });
  if (!opts?.quiet) {
    console.log(
      `idlease listening on http://${host}:${info.addr.port} (ids ${cfg.pool.min}-${cfg.pool.max}, lease ${cfg.pool.timeoutMs}ms)`,
    );
  }
  return {
    app,
    allocator,
    port: info.addr.port,
    host,
    close: () =>
      new Promise<void>((resolve, reject) => {
        info.server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
