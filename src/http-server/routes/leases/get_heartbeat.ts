/**
 * @file GET /heartbeat/:id handler
 * Renews the lease on :id. Lapsed leases answer IdExpired, unknown ids IdNonexistent.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { ensureNumericId } from "../../common/params";
import { toWirePayload } from "../../wire";

/**
 * Handle GET /heartbeat/:id.
 * @param c - Hono context
 * @param allocator - Route context
 */
export function getHeartbeat(c: Context, { allocator }: RouteContext) {
  const id = ensureNumericId(c, "id");
  return c.json(toWirePayload(allocator.heartbeat(id)));
}
