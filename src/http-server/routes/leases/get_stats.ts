/**
 * @file GET /stats handler
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";

/** Handle GET /stats: pool occupancy counters. */
export function getStats(c: Context, { allocator }: RouteContext) {
  return c.json(allocator.stats());
}
