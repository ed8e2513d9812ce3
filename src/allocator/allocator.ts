/**
 * @file Allocator: the single synchronized entry point over one lease pool
 *
 * Each operation is one critical section under the pool mutex: sample the
 * clock once, run the pool algorithm, check the partition, return. Lease
 * errors come back as values; anything thrown inside the section is a fault
 * that poisons the mutex, so every later call fails instead of handing out
 * an identifier from a pool in an unknown state.
 */
import type { Clock } from "../coordination/clock";
import { systemClock } from "../coordination/clock";
import { createMutex, type Mutex } from "../util/mutex";
import { acquireLease, assertPoolSize, auditPool, createPool, poolCapacity, renewLease, snapshotPool } from "../pool";
import type { Identifier, LeaseResult, PoolOptions, PoolSnapshot, PoolState } from "../pool";

export type Logger = Pick<Console, "warn" | "error">;

export type AllocatorOptions = {
  /** Bounds and timeout for a fresh pool, or a pool built with createPool. */
  pool: PoolOptions | PoolState;
  clock?: Clock;
  logger?: Logger;
  /** Run the full O(capacity) partition audit after every operation. */
  auditEveryOperation?: boolean;
};

export type PoolStats = {
  capacity: number;
  available: number;
  leased: number;
  timeoutMs: number;
  poisoned: boolean;
};

export type Allocator = {
  acquireNext(): LeaseResult;
  heartbeat(id: Identifier): LeaseResult;
  stats(): PoolStats;
  /** Copy of the pool contents, taken under the lock. */
  snapshot(): PoolSnapshot;
};

function isPoolState(p: PoolOptions | PoolState): p is PoolState {
  return "leases" in p && "available" in p;
}

/** Create an allocator; it becomes the only writer of its pool. */
export function createAllocator(opts: AllocatorOptions): Allocator {
  const pool: PoolState = isPoolState(opts.pool) ? opts.pool : createPool(opts.pool);
  const clock = opts.clock ?? systemClock;
  const logger = opts.logger ?? console;
  const audit = opts.auditEveryOperation ?? false;
  const mutex: Mutex = createMutex("pool");
  // counts after the last operation that passed the size check; stats() reports them once poisoned
  const lastGood = { available: pool.available.length, leased: pool.leases.size };

  const exclusive = <T>(op: string, fn: (now: number) => T): T => {
    try {
      return mutex.runExclusive(() => {
        const out = fn(clock.now());
        assertPoolSize(pool);
        if (audit) {
          auditPool(pool);
        }
        lastGood.available = pool.available.length;
        lastGood.leased = pool.leases.size;
        return out;
      });
    } catch (e) {
      logger.error(`[idlease] ${op} failed:`, e);
      throw e;
    }
  };

  return {
    acquireNext() {
      return exclusive("acquire", (now) => acquireLease(pool, now));
    },
    heartbeat(id) {
      const res = exclusive("heartbeat", (now) => renewLease(pool, id, now));
      if (!res.ok && res.error === "IdExpired") {
        // The holder kept using the id after its lease lapsed; another client may have had it meanwhile.
        logger.warn(`[idlease] heartbeat for expired id ${id}; returned to pool`);
      }
      return res;
    },
    stats() {
      if (mutex.poisoned) {
        return {
          capacity: poolCapacity(pool),
          available: lastGood.available,
          leased: lastGood.leased,
          timeoutMs: pool.timeoutMs,
          poisoned: true,
        };
      }
      return mutex.runExclusive(() => ({
        capacity: poolCapacity(pool),
        available: pool.available.length,
        leased: pool.leases.size,
        timeoutMs: pool.timeoutMs,
        poisoned: false,
      }));
    },
    snapshot() {
      return exclusive("snapshot", () => snapshotPool(pool));
    },
  };
}
