/**
 * @file Hono app assembly
 */
import { Hono } from "hono";
import type { Context } from "hono";
import type { Allocator } from "../allocator";
import { applyCors } from "./cors";
import { isHttpError } from "./common/errors";
import type { RouteContext } from "./routes/context";
import type { ServerOptions } from "./types";
import { getNext } from "./routes/leases/get_next";
import { getHeartbeat } from "./routes/leases/get_heartbeat";
import { getStats } from "./routes/leases/get_stats";

/** Build and return a Hono app exposing the allocator over HTTP. */
export function createApp(allocator: Allocator, server?: ServerOptions) {
  const app = new Hono();
  const rc: RouteContext = { allocator };
  const route = (h: (c: Context, rc: RouteContext) => Response) => (c: Context) => h(c, rc);

  app.onError((err, c) => {
    if (isHttpError(err)) {
      return c.json({ error: { message: err.message } }, err.status);
    }
    console.error(err);
    return c.json({ error: { message: err.message } }, 500);
  });
  app.notFound((c) => c.json({ error: { message: "Not Found" } }, 404));

  applyCors(app, server?.cors);

  app.get("/health", (c) => c.json({ ok: true }));
  app.get("/next", route(getNext));
  app.get("/heartbeat/:id", route(getHeartbeat));
  app.get("/stats", route(getStats));

  return app;
}
