/**
 * @file Lease pool barrel
 */
export {
  createPool,
  sweepExpired,
  acquireLease,
  renewLease,
  assertPoolSize,
  auditPool,
  snapshotPool,
  poolCapacity,
} from "./pool";
export { LEASE_ERRORS, PoolConfigError, InvariantViolationError } from "./errors";
export type { LeaseErrorName, LeaseErrorCode } from "./errors";
export type {
  Identifier,
  PoolOptions,
  PoolState,
  PoolSnapshot,
  LeaseGrant,
  LeaseFailure,
  LeaseResult,
} from "./types";
