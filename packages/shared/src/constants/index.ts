/**
 * SealVote Constants
 * Protocol limits shared by the engine and the SDK
 */

// ============================================
// INPUT LIMITS
// ============================================
export const LIMITS = {
  maxDaoNameLength: 64,
  maxTitleLength: 128,
  maxDescriptionLength: 1024,
  minRevealWindowSeconds: 5,
  minVotingDurationSeconds: 5,
  minPercentage: 1,
  maxPercentage: 100,
} as const;

// ============================================
// COMMITMENT SCHEME
// ============================================
export const COMMITMENT = {
  // sha256(vote_byte ‖ salt ‖ voter)
  algorithm: "sha256",
  digestBytes: 32,
  saltBytes: 32,
  identityBytes: 32,
  preimageBytes: 65,
  voteYes: 0x01,
  voteNo: 0x00,
} as const;

// ============================================
// REVEAL INCENTIVE
// ============================================
export const REVEAL_INCENTIVE = {
  // Paid to whoever submits a valid reveal (voter or keeper)
  defaultRebate: 1_000_000n,
  // Minimum balance that must stay on the proposal after a payment
  defaultReserve: 1_500_000n,
} as const;

// ============================================
// TIMELOCK
// ============================================
export const TIMELOCK = {
  defaultExecutionDelaySeconds: 86_400,
} as const;

// ============================================
// EXTERNAL VOTER WEIGHT RECORD
// ============================================
export const VOTER_WEIGHT = {
  // Consumers reject a record once the current time unit passes the expiry
  defaultExpiryUnits: 100,
} as const;

// ============================================
// FIXED-WIDTH INTEGER BOUNDS
// ============================================
export const U64_MAX = (1n << 64n) - 1n;
export const I64_MAX = (1n << 63n) - 1n;
export const I64_MIN = -(1n << 63n);

// The all-zero 32-byte identity
export const DEFAULT_IDENTITY = `0x${"00".repeat(32)}` as const;
