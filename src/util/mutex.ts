/**
 * @file Synchronous mutex for single-threaded critical sections
 *
 * Callers on the Node event loop never interleave inside a synchronous
 * function, so the mutex does not queue waiters. It enforces the discipline
 * instead: a critical section may not re-enter itself, and a critical
 * section that throws leaves the mutex poisoned so later callers fail loudly
 * instead of running against half-mutated state.
 */

/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */
/** Thrown when a critical section tries to take the mutex it already holds. */
export class LockReentryError extends Error {
  constructor(name: string) {
    super(`mutex '${name}' is already held by the current critical section`);
    this.name = "LockReentryError";
  }
}

/** Thrown by every call after a critical section failed while holding the mutex. */
export class MutexPoisonedError extends Error {
  constructor(name: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`mutex '${name}' is poisoned: ${reason}`, { cause });
    this.name = "MutexPoisonedError";
  }
}
/* eslint-enable no-restricted-syntax */

export type Mutex = {
  runExclusive<T>(fn: () => T): T;
  readonly held: boolean;
  readonly poisoned: boolean;
};

/** Create a named synchronous mutex. */
export function createMutex(name = "mutex"): Mutex {
  const state: { held: boolean; poison: { cause: unknown } | null } = { held: false, poison: null };
  return {
    runExclusive<T>(fn: () => T): T {
      if (state.poison) {
        throw new MutexPoisonedError(name, state.poison.cause);
      }
      if (state.held) {
        throw new LockReentryError(name);
      }
      state.held = true;
      try {
        return fn();
      } catch (e) {
        state.poison = { cause: e };
        throw e;
      } finally {
        state.held = false;
      }
    },
    get held() {
      return state.held;
    },
    get poisoned() {
      return state.poison !== null;
    },
  };
}
