/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * The allocator is the core: one lease pool behind one mutex, driven by an
 * injectable clock. The HTTP server and config helpers are the surfaces
 * that expose it.
 */

/**
 * Allocator API
 * - createAllocator: own a pool and serialize acquire/heartbeat over it
 * @public
 */
export { createAllocator } from "./allocator";
export type { Allocator, AllocatorOptions, Logger, PoolStats } from "./allocator";

/**
 * Lease pool primitives and result types
 * @public
 */
export {
  createPool,
  acquireLease,
  renewLease,
  sweepExpired,
  auditPool,
  snapshotPool,
  LEASE_ERRORS,
  PoolConfigError,
  InvariantViolationError,
} from "./pool";
export type { Identifier, LeaseResult, LeaseGrant, LeaseFailure, LeaseErrorName, PoolOptions, PoolSnapshot } from "./pool";

/**
 * Clocks
 * @public
 */
export { systemClock, fixedClock, offsetClock, manualClock } from "./coordination/clock";
export type { Clock, ManualClock } from "./coordination/clock";

export { MutexPoisonedError, LockReentryError } from "./util/mutex";

// HTTP surface and config
export { createApp, startServer, toWirePayload } from "./http-server";
export type { RunningServer, WirePayload } from "./http-server";
export { defineConfig, loadAppConfig, ConfigError } from "./config";
export type { AppConfig, RawAppConfig } from "./config";
