/**
 * @file Lease pool state and result types
 */
import type { Fifo } from "../util/fifo";
import type { LeaseErrorName } from "./errors";

/** Integer in the pool's closed range [min, max]. */
export type Identifier = number;

export type PoolOptions = {
  /** Lowest identifier handed out (inclusive). */
  min: number;
  /** Highest identifier handed out (inclusive). */
  max: number;
  /** Lease duration in ms applied to every acquire and renew. */
  timeoutMs: number;
};

/**
 * Every identifier in [min, max] lives in exactly one of `available` and
 * `leases`. Treat as opaque outside src/pool.
 */
export type PoolState = PoolOptions & {
  available: Fifo<Identifier>;
  /** identifier -> expiry (ms since epoch) */
  leases: Map<Identifier, number>;
};

export type LeaseGrant = { ok: true; id: Identifier; exp: number };
export type LeaseFailure = { ok: false; error: LeaseErrorName };
export type LeaseResult = LeaseGrant | LeaseFailure;

export type PoolSnapshot = PoolOptions & {
  capacity: number;
  /** Available queue, front first. */
  available: Identifier[];
  /** Lease table entries in ascending identifier order. */
  leases: Array<[Identifier, number]>;
};
