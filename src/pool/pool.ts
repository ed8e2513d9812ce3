/**
 * @file Lease pool: available queue + lease table over a fixed identifier range
 *
 * These functions mutate the pool they are given and do no locking of their
 * own; the allocator serializes them. Reclamation is lazy: expired leases
 * return to the queue only when a sweep (run by every acquire) or a renew of
 * that identifier notices them.
 *
 * Known limitation: a renew from a client whose lease already lapsed and was
 * swept and re-issued to another client lands on the new holder's lease and
 * extends it. Nothing here records which client holds an identifier.
 */
import { Fifo } from "../util/fifo";
import { InvariantViolationError, PoolConfigError } from "./errors";
import type { Identifier, LeaseResult, PoolOptions, PoolSnapshot, PoolState } from "./types";

/** Number of identifiers in [min, max]. */
export function poolCapacity(pool: PoolOptions): number {
  return pool.max - pool.min + 1;
}

function assertOptions({ min, max, timeoutMs }: PoolOptions) {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new PoolConfigError(`pool bounds must be safe integers (min=${min}, max=${max})`);
  }
  if (min > max) {
    throw new PoolConfigError(`pool min must not exceed max (min=${min}, max=${max})`);
  }
  if (!Number.isSafeInteger(timeoutMs) || timeoutMs <= 0) {
    throw new PoolConfigError(`lease timeout must be a positive integer (timeoutMs=${timeoutMs})`);
  }
}

/** Build a pool with every identifier available in ascending order and no leases. */
export function createPool(opts: PoolOptions): PoolState {
  assertOptions(opts);
  const available = new Fifo<Identifier>();
  for (let id = opts.min; id <= opts.max; id++) {
    available.push(id);
  }
  return { min: opts.min, max: opts.max, timeoutMs: opts.timeoutMs, available, leases: new Map() };
}

/** Reclaim every lease with expiry <= now, appending ids to the queue in ascending order. */
export function sweepExpired(pool: PoolState, now: number): number {
  const expired: Identifier[] = [];
  for (const [id, exp] of pool.leases) {
    if (exp <= now) {
      expired.push(id);
    }
  }
  expired.sort((a, b) => a - b);
  for (const id of expired) {
    pool.leases.delete(id);
    pool.available.push(id);
  }
  return expired.length;
}

/** Sweep, then lease the identifier at the front of the queue until now + timeoutMs. */
export function acquireLease(pool: PoolState, now: number, timeoutMs: number = pool.timeoutMs): LeaseResult {
  sweepExpired(pool, now);
  const id = pool.available.shift();
  if (id === undefined) {
    return { ok: false, error: "NoIdAvailable" };
  }
  if (pool.leases.has(id)) {
    throw new InvariantViolationError(`identifier ${id} was available and leased at once`);
  }
  const exp = now + timeoutMs;
  pool.leases.set(id, exp);
  return { ok: true, id, exp };
}

/**
 * Extend a live lease to now + timeoutMs. A lapsed lease is reclaimed on the
 * spot and reported as IdExpired; an identifier not in the lease table is
 * IdNonexistent and changes nothing.
 */
export function renewLease(
  pool: PoolState,
  id: Identifier,
  now: number,
  timeoutMs: number = pool.timeoutMs,
): LeaseResult {
  const current = pool.leases.get(id);
  if (current === undefined) {
    return { ok: false, error: "IdNonexistent" };
  }
  if (current <= now) {
    pool.leases.delete(id);
    pool.available.push(id);
    return { ok: false, error: "IdExpired" };
  }
  const exp = now + timeoutMs;
  pool.leases.set(id, exp);
  return { ok: true, id, exp };
}

/** O(1) check that the two structures together still hold the whole range. */
export function assertPoolSize(pool: PoolState): void {
  const total = pool.available.length + pool.leases.size;
  if (total !== poolCapacity(pool)) {
    throw new InvariantViolationError(
      `expected ${poolCapacity(pool)} identifiers, found ${pool.available.length} available + ${pool.leases.size} leased`,
    );
  }
}

/** Full partition audit; throws on the first identifier out of place. */
export function auditPool(pool: PoolState): void {
  const seen = new Set<Identifier>();
  for (const id of pool.available) {
    if (!Number.isInteger(id) || id < pool.min || id > pool.max) {
      throw new InvariantViolationError(`identifier ${id} in available queue is out of range`);
    }
    if (seen.has(id)) {
      throw new InvariantViolationError(`identifier ${id} appears twice in available queue`);
    }
    if (pool.leases.has(id)) {
      throw new InvariantViolationError(`identifier ${id} is both available and leased`);
    }
    seen.add(id);
  }
  for (const id of pool.leases.keys()) {
    if (!Number.isInteger(id) || id < pool.min || id > pool.max) {
      throw new InvariantViolationError(`identifier ${id} in lease table is out of range`);
    }
    seen.add(id);
  }
  for (let id = pool.min; id <= pool.max; id++) {
    if (!seen.has(id)) {
      throw new InvariantViolationError(`identifier ${id} is neither available nor leased`);
    }
  }
}

/** Copy of the pool contents for diagnostics and tests. */
export function snapshotPool(pool: PoolState): PoolSnapshot {
  return {
    min: pool.min,
    max: pool.max,
    timeoutMs: pool.timeoutMs,
    capacity: poolCapacity(pool),
    available: pool.available.toArray(),
    leases: [...pool.leases.entries()].sort((a, b) => a[0] - b[0]),
  };
}
