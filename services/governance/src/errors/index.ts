/**
 * Governance Errors
 *
 * Every rejected request raises one of these. The class carries the category,
 * `code` names the exact rule that failed.
 */

export type GovernanceErrorCategory =
  | "validation"
  | "state"
  | "authorization"
  | "crypto_mismatch"
  | "duplicate"
  | "window"
  | "arithmetic";

export abstract class GovernanceError extends Error {
  abstract readonly category: GovernanceErrorCategory;

  constructor(
    public readonly code: string,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input: oversized strings, out-of-range percentages, bad payloads */
export class ValidationError extends GovernanceError {
  readonly category = "validation";
}

/** Operation not valid in the current lifecycle state */
export class StateError extends GovernanceError {
  readonly category = "state";
}

/** Caller lacks the required role */
export class AuthorizationError extends GovernanceError {
  readonly category = "authorization";
}

/** Recomputed commitment differs from the stored one */
export class CryptoMismatchError extends GovernanceError {
  readonly category = "crypto_mismatch";
}

/** Second commit, reused delegation, double reveal */
export class DuplicateError extends GovernanceError {
  readonly category = "duplicate";
}

/** Action attempted outside its time window */
export class WindowError extends GovernanceError {
  readonly category = "window";
}

/** A checked operation left its fixed-width range */
export class ArithmeticError extends GovernanceError {
  readonly category = "arithmetic";
}

/** Stored bytes do not decode as the expected record */
export class CorruptRecordError extends StateError {
  constructor(
    public readonly recordName: string,
    reason: string
  ) {
    super("CORRUPT_RECORD", `${recordName} record is corrupt: ${reason}`, { recordName });
  }
}

/** The reference treasury could not cover a transfer */
export class InsufficientTreasuryFundsError extends Error {
  constructor(
    message: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(message);
    this.name = "InsufficientTreasuryFundsError";
  }
}

export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError;
}
