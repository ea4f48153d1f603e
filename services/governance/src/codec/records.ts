/**
 * Record layouts
 *
 * Each record has a fixed byte size sized for the longest variant of every
 * optional or variant field:
 *
 *   DaoConfig          209  = 8 + 32 + (4+64) + 32 + 1 + 8 + 8 + 8 + 3 + 8 + 33
 *   Proposal          1397  = 8 + 32 + 32 + 8 + (4+128) + (4+1024) + 1 + 8 + 8
 *                             + 4*8 + 8 + 8 + (1+74) + 8 + 1 + 8
 *   VoterRecord        156  = 8 + 32 + 32 + 32 + 8 + 8 + 1 + 1 + 1 + 33
 *   VoteDelegation     121  = 8 + 32 + 32 + 32 + 8 + 8 + 1
 *   VoterWeightRecord  164  = 8 + 32 + 32 + 32 + 8 + 9 + 2 + 33 + 8
 *   IncentiveCredit     48  = 8 + 32 + 8
 */

import { LIMITS, type ProposalStatus } from "@sealvote/shared";
import { CorruptRecordError } from "../errors/index.js";
import { deriveKey } from "../commitment/index.js";
import type {
  DaoConfig,
  IncentiveCredit,
  Proposal,
  TreasuryAction,
  VoteDelegation,
  VoterRecord,
  VoterWeightRecord,
  VotingConfig,
} from "../types.js";
import { BinaryReader, BinaryWriter } from "./binary.js";

export interface RecordCodec<T> {
  readonly name: string;
  readonly size: number;
  encode(value: T): Buffer;
  decode(bytes: Uint8Array): T;
}

// ============================================
// KEYS
// ============================================

export const recordKeys = {
  dao: (authority: string, name: string) => deriveKey("dao", authority, name),
  proposal: (dao: string, proposalId: bigint) => deriveKey("proposal", dao, proposalId),
  vote: (proposal: string, voter: string) => deriveKey("vote", proposal, voter),
  delegation: (proposal: string, delegator: string) => deriveKey("delegation", proposal, delegator),
  voterWeight: (realm: string, mint: string, owner: string) =>
    deriveKey("voter-weight-record", realm, mint, owner),
  incentive: (owner: string) => deriveKey("incentive", owner),
};

// ============================================
// ENUM TAGS
// ============================================

const STATUS_TAGS: readonly ProposalStatus[] = ["voting", "passed", "failed", "cancelled", "vetoed"];

function statusFromTag(tag: number): ProposalStatus {
  const status = STATUS_TAGS[tag];
  if (status === undefined) {
    throw new CorruptRecordError("Proposal", `unknown status tag ${tag}`);
  }
  return status;
}

function writeVotingConfig(w: BinaryWriter, config: VotingConfig): void {
  switch (config.kind) {
    case "token_weighted":
      w.u8(0).u8(0).u8(0);
      return;
    case "quadratic":
      w.u8(1).u8(0).u8(0);
      return;
    case "dual_chamber":
      w.u8(2).u8(config.capitalThreshold).u8(config.communityThreshold);
      return;
  }
}

function readVotingConfig(r: BinaryReader): VotingConfig {
  const tag = r.u8();
  const capitalThreshold = r.u8();
  const communityThreshold = r.u8();
  switch (tag) {
    case 0:
      return { kind: "token_weighted" };
    case 1:
      return { kind: "quadratic" };
    case 2:
      return { kind: "dual_chamber", capitalThreshold, communityThreshold };
    default:
      throw new CorruptRecordError("DaoConfig", `unknown voting config tag ${tag}`);
  }
}

// kind(1) + amount(8) + recipient(32) + mint option(1+32)
const TREASURY_ACTION_BYTES = 74;

function writeTreasuryAction(w: BinaryWriter, action: TreasuryAction): void {
  const tag = action.kind === "send_native" ? 0 : action.kind === "send_token" ? 1 : 2;
  w.u8(tag).u64(action.amount).bytes32(action.recipient);
  w.option(action.kind === "send_token" ? action.tokenMint : undefined, 32, (ww, mint) => {
    ww.bytes32(mint);
  });
}

function readTreasuryAction(r: BinaryReader): TreasuryAction {
  const tag = r.u8();
  const amount = r.u64();
  const recipient = r.bytes32();
  const tokenMint = r.option(32, (rr) => rr.bytes32());
  switch (tag) {
    case 0:
      return { kind: "send_native", amount, recipient };
    case 1:
      if (tokenMint === undefined) {
        throw new CorruptRecordError("Proposal", "send_token action without a token mint");
      }
      return { kind: "send_token", amount, recipient, tokenMint };
    case 2:
      return { kind: "custom", amount, recipient };
    default:
      throw new CorruptRecordError("Proposal", `unknown treasury action tag ${tag}`);
  }
}

// ============================================
// CODECS
// ============================================

export const daoCodec: RecordCodec<DaoConfig> = {
  name: "DaoConfig",
  size: 209,
  encode(dao) {
    const w = new BinaryWriter(this.name, this.size)
      .bytes32(dao.authority)
      .string(dao.name, LIMITS.maxDaoNameLength)
      .bytes32(dao.governanceToken)
      .u8(dao.quorumPercentage)
      .u64(dao.requiredBalance)
      .i64(dao.revealWindowSeconds)
      .i64(dao.executionDelaySeconds);
    writeVotingConfig(w, dao.votingConfig);
    return w
      .u64(dao.proposalCount)
      .option(dao.migratedFrom, 32, (ww, from) => {
        ww.bytes32(from);
      })
      .finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    const authority = r.bytes32();
    const name = r.string(LIMITS.maxDaoNameLength);
    const governanceToken = r.bytes32();
    const quorumPercentage = r.u8();
    const requiredBalance = r.u64();
    const revealWindowSeconds = r.i64();
    const executionDelaySeconds = r.i64();
    const votingConfig = readVotingConfig(r);
    const proposalCount = r.u64();
    const migratedFrom = r.option(32, (rr) => rr.bytes32());
    return {
      key: recordKeys.dao(authority, name),
      authority,
      name,
      governanceToken,
      quorumPercentage,
      requiredBalance,
      revealWindowSeconds,
      executionDelaySeconds,
      votingConfig,
      proposalCount,
      ...(migratedFrom !== undefined ? { migratedFrom } : {}),
    };
  },
};

export const proposalCodec: RecordCodec<Proposal> = {
  name: "Proposal",
  size: 1397,
  encode(p) {
    return new BinaryWriter(this.name, this.size)
      .bytes32(p.dao)
      .bytes32(p.proposer)
      .u64(p.proposalId)
      .string(p.title, LIMITS.maxTitleLength)
      .string(p.description, LIMITS.maxDescriptionLength)
      .u8(STATUS_TAGS.indexOf(p.status))
      .i64(p.votingEnd)
      .i64(p.revealEnd)
      .u64(p.yesCapital)
      .u64(p.noCapital)
      .u64(p.yesCommunity)
      .u64(p.noCommunity)
      .u64(p.commitCount)
      .u64(p.revealCount)
      .option(p.treasuryAction, TREASURY_ACTION_BYTES, writeTreasuryAction)
      .i64(p.executionUnlocksAt)
      .bool(p.isExecuted)
      .u64(p.incentiveBalance)
      .finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    const dao = r.bytes32();
    const proposer = r.bytes32();
    const proposalId = r.u64();
    const title = r.string(LIMITS.maxTitleLength);
    const description = r.string(LIMITS.maxDescriptionLength);
    const status = statusFromTag(r.u8());
    const votingEnd = r.i64();
    const revealEnd = r.i64();
    const yesCapital = r.u64();
    const noCapital = r.u64();
    const yesCommunity = r.u64();
    const noCommunity = r.u64();
    const commitCount = r.u64();
    const revealCount = r.u64();
    const treasuryAction = r.option(TREASURY_ACTION_BYTES, readTreasuryAction);
    const executionUnlocksAt = r.i64();
    const isExecuted = r.bool();
    const incentiveBalance = r.u64();
    return {
      key: recordKeys.proposal(dao, proposalId),
      dao,
      proposer,
      proposalId,
      title,
      description,
      status,
      votingEnd,
      revealEnd,
      yesCapital,
      noCapital,
      yesCommunity,
      noCommunity,
      commitCount,
      revealCount,
      ...(treasuryAction !== undefined ? { treasuryAction } : {}),
      executionUnlocksAt,
      isExecuted,
      incentiveBalance,
    };
  },
};

export const voterRecordCodec: RecordCodec<VoterRecord> = {
  name: "VoterRecord",
  size: 156,
  encode(vr) {
    return new BinaryWriter(this.name, this.size)
      .bytes32(vr.voter)
      .bytes32(vr.proposal)
      .bytes32(vr.commitment)
      .u64(vr.capitalWeight)
      .u64(vr.communityWeight)
      .bool(vr.hasCommitted)
      .bool(vr.hasRevealed)
      .bool(vr.votedYes)
      .option(vr.keeper, 32, (w, keeper) => {
        w.bytes32(keeper);
      })
      .finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    const voter = r.bytes32();
    const proposal = r.bytes32();
    const commitment = r.bytes32();
    const capitalWeight = r.u64();
    const communityWeight = r.u64();
    const hasCommitted = r.bool();
    const hasRevealed = r.bool();
    const votedYes = r.bool();
    const keeper = r.option(32, (rr) => rr.bytes32());
    return {
      voter,
      proposal,
      commitment,
      capitalWeight,
      communityWeight,
      hasCommitted,
      hasRevealed,
      votedYes,
      ...(keeper !== undefined ? { keeper } : {}),
    };
  },
};

export const delegationCodec: RecordCodec<VoteDelegation> = {
  name: "VoteDelegation",
  size: 121,
  encode(d) {
    return new BinaryWriter(this.name, this.size)
      .bytes32(d.delegator)
      .bytes32(d.delegatee)
      .bytes32(d.proposal)
      .u64(d.delegatedCapital)
      .u64(d.delegatedCommunity)
      .bool(d.isUsed)
      .finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    const delegator = r.bytes32();
    const delegatee = r.bytes32();
    const proposal = r.bytes32();
    return {
      key: recordKeys.delegation(proposal, delegator),
      delegator,
      delegatee,
      proposal,
      delegatedCapital: r.u64(),
      delegatedCommunity: r.u64(),
      isUsed: r.bool(),
    };
  },
};

export const voterWeightRecordCodec: RecordCodec<VoterWeightRecord> = {
  name: "VoterWeightRecord",
  size: 164,
  encode(vwr) {
    return new BinaryWriter(this.name, this.size)
      .bytes32(vwr.realm)
      .bytes32(vwr.governingTokenMint)
      .bytes32(vwr.governingTokenOwner)
      .u64(vwr.voterWeight)
      .option(vwr.voterWeightExpiry, 8, (w, expiry) => {
        w.u64(expiry);
      })
      .option(vwr.weightAction, 1, (w, action) => {
        w.u8(action);
      })
      .option(vwr.weightActionTarget, 32, (w, target) => {
        w.bytes32(target);
      })
      .raw(vwr.reserved, 8)
      .finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    const realm = r.bytes32();
    const governingTokenMint = r.bytes32();
    const governingTokenOwner = r.bytes32();
    const voterWeight = r.u64();
    const voterWeightExpiry = r.option(8, (rr) => rr.u64());
    const weightAction = r.option(1, (rr) => rr.u8());
    const weightActionTarget = r.option(32, (rr) => rr.bytes32());
    const reserved = r.raw(8);
    return {
      realm,
      governingTokenMint,
      governingTokenOwner,
      voterWeight,
      ...(voterWeightExpiry !== undefined ? { voterWeightExpiry } : {}),
      ...(weightAction !== undefined ? { weightAction } : {}),
      ...(weightActionTarget !== undefined ? { weightActionTarget } : {}),
      reserved,
    };
  },
};

export const incentiveCreditCodec: RecordCodec<IncentiveCredit> = {
  name: "IncentiveCredit",
  size: 48,
  encode(credit) {
    return new BinaryWriter(this.name, this.size).bytes32(credit.owner).u64(credit.amount).finish();
  },
  decode(bytes) {
    const r = new BinaryReader(this.name, bytes, this.size);
    return { owner: r.bytes32(), amount: r.u64() };
  },
};
