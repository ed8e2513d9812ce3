/**
 * @file Clock utilities for injectable current-time semantics
 *
 * All timestamps are integer milliseconds since the Unix epoch.
 */

export type Clock = { now(): number };

/** Controllable clock for tests: time only moves when told to. */
export type ManualClock = Clock & {
  set(ts: number): void;
  advance(ms: number): number;
};

/** Wrap a raw time source so successive reads never go backwards. */
export function monotonic(source: () => number): Clock {
  const state = { last: Number.NEGATIVE_INFINITY };
  return {
    now() {
      const t = Math.floor(source());
      state.last = Math.max(state.last, t);
      return state.last;
    },
  };
}

/** System clock backed by Date.now(), clamped to be non-decreasing. */
export const systemClock: Clock = monotonic(() => Date.now());

/** Fixed clock for tests; always returns the same timestamp. */
export function fixedClock(ts: number): Clock {
  return { now: () => ts };
}

/** Offset clock for tests; returns Date.now() + offsetMs. */
export function offsetClock(offsetMs: number): Clock {
  return monotonic(() => Date.now() + offsetMs);
}

/** Manual clock starting at `start`. `set` refuses to move time backwards. */
export function manualClock(start = 0): ManualClock {
  const state = { t: Math.floor(start) };
  return {
    now: () => state.t,
    set(ts) {
      const next = Math.floor(ts);
      if (next < state.t) {
        throw new RangeError(`clock cannot move backwards (${state.t} -> ${next})`);
      }
      state.t = next;
    },
    advance(ms) {
      if (ms < 0) {
        throw new RangeError("clock cannot advance by a negative amount");
      }
      state.t += Math.floor(ms);
      return state.t;
    },
  };
}
