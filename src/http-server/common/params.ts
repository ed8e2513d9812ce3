/**
 * @file Common request param helpers
 */
import type { Context } from "hono";
import { httpError } from "./errors";

/** Read a non-negative decimal integer path param, or fail with 400. */
export function ensureNumericId(c: Context, name: string = "id"): number {
  const raw = c.req.param(name) ?? "";
  if (!/^\d+$/.test(raw)) {
    throw httpError(400, "Invalid id");
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw httpError(400, "Invalid id");
  }
  return id;
}
