/**
 * Governance Domain Types
 *
 * - DAO configuration and voting modes
 * - Proposal lifecycle and tallies
 * - Voter records and delegations
 * - Treasury actions
 * - External voter weight record
 */

import type { Hex32, Identity, ProposalStatus } from "@sealvote/shared";

// ============================================
// VOTING CONFIG
// ============================================

export type VotingConfig =
  | { kind: "token_weighted" }
  | { kind: "quadratic" }
  | {
      kind: "dual_chamber";
      capitalThreshold: number;   // % of linear YES required (1-100)
      communityThreshold: number; // % of quadratic YES required (1-100)
    };

// ============================================
// DAO CONFIG
// ============================================

export interface DaoConfig {
  key: string;
  authority: Identity;
  name: string;
  governanceToken: Identity;
  quorumPercentage: number;
  // 0 = anyone may vote
  requiredBalance: bigint;
  revealWindowSeconds: number;
  executionDelaySeconds: number;
  votingConfig: VotingConfig;
  proposalCount: bigint;
  // Informational only
  migratedFrom?: Identity;
}

// ============================================
// TREASURY ACTIONS
// ============================================

export type TreasuryAction =
  | { kind: "send_native"; amount: bigint; recipient: Identity }
  | { kind: "send_token"; amount: bigint; recipient: Identity; tokenMint: Identity }
  | { kind: "custom"; amount: bigint; recipient: Identity };

/**
 * Loose form accepted at the request boundary. Shape rules are enforced by
 * validateTreasuryAction, which narrows this to TreasuryAction.
 */
export interface TreasuryActionInput {
  kind: TreasuryAction["kind"];
  amount: bigint;
  recipient: Identity;
  tokenMint?: Identity;
}

// ============================================
// PROPOSAL
// ============================================

export interface Tally {
  yesCapital: bigint;
  noCapital: bigint;
  yesCommunity: bigint;
  noCommunity: bigint;
  commitCount: bigint;
  revealCount: bigint;
}

export interface Proposal extends Tally {
  key: string;
  dao: string;
  proposer: Identity;
  proposalId: bigint;
  title: string;
  description: string;
  status: ProposalStatus;
  votingEnd: number;
  revealEnd: number;
  treasuryAction?: TreasuryAction;
  // 0 until the proposal passes
  executionUnlocksAt: number;
  isExecuted: boolean;
  // Funds reveal incentives
  incentiveBalance: bigint;
}

// ============================================
// VOTER RECORD
// ============================================

export interface VoterRecord {
  voter: Identity;
  proposal: string;
  commitment: Hex32;
  // Snapshotted at commit time (own + delegated)
  capitalWeight: bigint;
  communityWeight: bigint;
  hasCommitted: boolean;
  hasRevealed: boolean;
  votedYes: boolean;
  keeper?: Identity;
}

// ============================================
// DELEGATION
// ============================================

export interface VoteDelegation {
  key: string;
  delegator: Identity;
  delegatee: Identity;
  proposal: string;
  delegatedCapital: bigint;
  delegatedCommunity: bigint;
  isUsed: boolean;
}

// ============================================
// EXTERNAL VOTER WEIGHT RECORD
// ============================================

export interface VoterWeightRecord {
  realm: Identity;
  governingTokenMint: Identity;
  governingTokenOwner: Identity;
  voterWeight: bigint;
  voterWeightExpiry?: bigint;
  weightAction?: number;
  weightActionTarget?: Identity;
  reserved: Uint8Array;
}

// ============================================
// REVEAL INCENTIVES
// ============================================

export interface IncentiveCredit {
  owner: Identity;
  amount: bigint;
}

// ============================================
// HOST COLLABORATORS
// ============================================

/** Host time source, read once per request */
export interface Clock {
  now(): number;
}

/** External token-balance ledger used to determine voting weight */
export interface TokenBalanceSource {
  balanceOf(owner: Identity, mint: Identity): bigint;
}
