/**
 * @file Lease outcome codes and pool fault types
 *
 * The three lease errors are ordinary result values with fixed wire codes.
 * The Error classes below are faults: bad construction input or a broken
 * pool partition, neither of which a caller can recover from by retrying.
 */

export const LEASE_ERRORS = {
  NoIdAvailable: { code: 1, msg: "No id available!" },
  IdExpired: { code: 2, msg: "Id expired!" },
  IdNonexistent: { code: 3, msg: "Id nonexistent!" },
} as const;

export type LeaseErrorName = keyof typeof LEASE_ERRORS;
export type LeaseErrorCode = (typeof LEASE_ERRORS)[LeaseErrorName]["code"];

/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */
/** Thrown when pool bounds or timeout are unusable. */
export class PoolConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PoolConfigError";
  }
}

/** Thrown when the available/leased partition is found broken. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`pool invariant violated: ${message}`);
    this.name = "InvariantViolationError";
  }
}
/* eslint-enable no-restricted-syntax */
