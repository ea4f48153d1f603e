/**
 * @sealvote/governance
 * Private-ballot governance engine
 */

// Engine
export { GovernanceEngine, createGovernanceEngine } from "./engine/governance-engine.js";
export type { GovernanceEngineOptions, FinalizeResult } from "./engine/governance-engine.js";
export { ManualClock, SystemClock } from "./engine/clock.js";

// Configuration
export {
  DEFAULT_GOVERNANCE_CONFIG,
  loadGovernanceConfig,
  resolveGovernanceConfig,
} from "./config.js";
export type { GovernanceConfig } from "./config.js";

// Components
export { ConfigRegistry, validateConfigParams } from "./registry/config-registry.js";
export type { ConfigParams, MigrateParams } from "./registry/config-registry.js";
export { ProposalStore } from "./proposals/proposal-store.js";
export type { CreateProposalParams } from "./proposals/proposal-store.js";
export { validateTreasuryAction } from "./proposals/treasury-action.js";
export { CommitRevealEngine, assertVotingOpen } from "./voting/commit-reveal-engine.js";
export type { CommitParams, RevealParams, RevealResult, WeightSnapshot } from "./voting/commit-reveal-engine.js";
export { DelegationLedger } from "./delegation/delegation-ledger.js";
export type { DelegateParams, CommitDelegatedParams } from "./delegation/delegation-ledger.js";
export { TallyEvaluator, evaluateTally, isQuorumMet } from "./tally/tally-evaluator.js";
export type { TallyEvaluation } from "./tally/tally-evaluator.js";
export { TimelockController } from "./timelock/timelock-controller.js";
export type { AuthorizedExecution, ExecutionOutcome } from "./timelock/timelock-controller.js";
export { InMemoryTreasuryGateway } from "./treasury/treasury-gateway.js";
export type {
  IncentiveEscrowRequest,
  TransferableAction,
  TransferLogEntry,
  TransferReceipt,
  TransferRequest,
  TreasuryGateway,
} from "./treasury/treasury-gateway.js";
export { InMemoryBalanceSource } from "./weight/balance-source.js";
export { VoterWeightService } from "./weight/voter-weight.js";
export type { SyncedVoterWeight, SyncVoterWeightParams } from "./weight/voter-weight.js";

// Primitives
export { isqrt, checkedAddU64, checkedSubU64, checkedAddSeconds } from "./math/index.js";
export { computeCommitment, verifyCommitment, buildPreimage, deriveKey } from "./commitment/index.js";
export {
  daoCodec,
  proposalCodec,
  voterRecordCodec,
  delegationCodec,
  voterWeightRecordCodec,
  incentiveCreditCodec,
  recordKeys,
} from "./codec/records.js";
export type { RecordCodec } from "./codec/records.js";
export { HEADER_BYTES, recordHeader } from "./codec/binary.js";
export { MemoryRecordStore, readRecord, writeRecord } from "./store/record-store.js";
export type { RecordStore } from "./store/record-store.js";
export { GovernanceEventLog, EventBuffer } from "./events/event-log.js";
export type {
  GovernanceEvent,
  GovernanceEventPayloads,
  GovernanceEventType,
  StagedEvent,
} from "./events/event-log.js";

// Errors
export * from "./errors/index.js";

// Requests and domain types
export * from "./schemas.js";
export type * from "./types.js";
export type { RequestContext } from "./context.js";
