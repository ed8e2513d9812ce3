/**
 * @file Lease results -> JSON wire payloads
 *
 * Success and failure both travel as HTTP 200; clients tell them apart by
 * the presence of `error`.
 */
import { LEASE_ERRORS } from "../pool";
import type { LeaseErrorCode, LeaseResult } from "../pool";

export type LeasePayload = { id: number; exp: number };
export type LeaseErrorPayload = { error: { code: LeaseErrorCode; msg: string } };
export type WirePayload = LeasePayload | LeaseErrorPayload;

/** Translate an allocator result into its response body. */
export function toWirePayload(res: LeaseResult): WirePayload {
  if (res.ok) {
    return { id: res.id, exp: res.exp };
  }
  const { code, msg } = LEASE_ERRORS[res.error];
  return { error: { code, msg } };
}

/** Narrow a payload to the error shape. */
export function isErrorPayload(p: WirePayload): p is LeaseErrorPayload {
  return "error" in p;
}
