/**
 * Request Schemas
 *
 * Shape validation for the operation surface. Domain rules (length limits,
 * percentage ranges, windows) are enforced by the components themselves.
 */

import { z } from "zod";
import {
  bytes32Schema,
  identitySchema,
  secondsSchema,
  treasuryActionKindSchema,
  u64Schema,
} from "@sealvote/shared";

// ============================================
// SHARED PIECES
// ============================================

/** Derived record key (DAO, proposal, delegation) */
const recordKeySchema = bytes32Schema;

const callerSchema = z.object({ caller: identitySchema });

export const votingConfigSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("token_weighted") }),
  z.object({ kind: z.literal("quadratic") }),
  z.object({
    kind: z.literal("dual_chamber"),
    capitalThreshold: z.number().int(),
    communityThreshold: z.number().int(),
  }),
]);

export const treasuryActionInputSchema = z.object({
  kind: treasuryActionKindSchema,
  amount: u64Schema,
  recipient: identitySchema,
  tokenMint: identitySchema.optional(),
});

// ============================================
// CONFIG REGISTRY
// ============================================

export const createConfigRequestSchema = callerSchema.extend({
  name: z.string(),
  governanceToken: identitySchema,
  quorumPercentage: z.number().int(),
  requiredBalance: u64Schema.default(0n),
  revealWindowSeconds: secondsSchema,
  executionDelaySeconds: secondsSchema,
  votingConfig: votingConfigSchema,
});
export type CreateConfigRequest = z.input<typeof createConfigRequestSchema>;

export const migrateConfigRequestSchema = callerSchema.extend({
  name: z.string(),
  governanceToken: identitySchema,
  quorumPercentage: z.number().int(),
  revealWindowSeconds: secondsSchema,
  executionDelaySeconds: secondsSchema,
  votingConfig: votingConfigSchema,
  migratedFrom: identitySchema,
});
export type MigrateConfigRequest = z.input<typeof migrateConfigRequestSchema>;

// ============================================
// PROPOSALS
// ============================================

export const createProposalRequestSchema = callerSchema.extend({
  dao: recordKeySchema,
  title: z.string(),
  description: z.string(),
  votingDurationSeconds: secondsSchema,
  treasuryAction: treasuryActionInputSchema.optional(),
  incentiveDeposit: u64Schema.default(0n),
});
export type CreateProposalRequest = z.input<typeof createProposalRequestSchema>;

export const proposalRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
});
export type ProposalRequest = z.input<typeof proposalRequestSchema>;

// ============================================
// VOTING
// ============================================

export const commitVoteRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
  commitment: bytes32Schema,
  keeper: identitySchema.optional(),
});
export type CommitVoteRequest = z.input<typeof commitVoteRequestSchema>;

export const revealVoteRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
  // Original voter; equals caller unless a keeper reveals
  voter: identitySchema,
  vote: z.boolean(),
  salt: bytes32Schema,
});
export type RevealVoteRequest = z.input<typeof revealVoteRequestSchema>;

export const delegateRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
  delegatee: identitySchema,
});
export type DelegateRequest = z.input<typeof delegateRequestSchema>;

export const commitDelegatedVoteRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
  delegation: recordKeySchema,
  commitment: bytes32Schema,
  keeper: identitySchema.optional(),
});
export type CommitDelegatedVoteRequest = z.input<typeof commitDelegatedVoteRequestSchema>;

// ============================================
// EXECUTION & TREASURY
// ============================================

export const executeRequestSchema = callerSchema.extend({
  proposal: recordKeySchema,
  target: identitySchema.optional(),
});
export type ExecuteRequest = z.input<typeof executeRequestSchema>;

export const depositTreasuryRequestSchema = callerSchema.extend({
  dao: recordKeySchema,
  amount: u64Schema,
  tokenMint: identitySchema.optional(),
});
export type DepositTreasuryRequest = z.input<typeof depositTreasuryRequestSchema>;

// ============================================
// EXTERNAL VOTER WEIGHT
// ============================================

export const syncVoterWeightRequestSchema = callerSchema.extend({
  dao: recordKeySchema,
  realm: identitySchema,
  governingTokenMint: identitySchema,
});
export type SyncVoterWeightRequest = z.input<typeof syncVoterWeightRequestSchema>;

export const readCommittedWeightRequestSchema = z.object({
  proposal: recordKeySchema,
  voter: identitySchema,
});
export type ReadCommittedWeightRequest = z.input<typeof readCommittedWeightRequestSchema>;
