/**
 * @file GET /next handler
 * Leases the next available id, or answers with NoIdAvailable.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { toWirePayload } from "../../wire";

/**
 * Handle GET /next.
 * @param c - Hono context
 * @param allocator - Route context
 */
export function getNext(c: Context, { allocator }: RouteContext) {
  return c.json(toWirePayload(allocator.acquireNext()));
}
