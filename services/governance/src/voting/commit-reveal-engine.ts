/**
 * Commit-Reveal Engine
 *
 * Phase 1 (commit): the voter stores sha256(vote ‖ salt ‖ voter) and both
 * chamber weights are snapshotted from the balance source. Nothing about the
 * choice is visible until the reveal window opens.
 *
 * Phase 2 (reveal): the voter, or the keeper they named at commit time,
 * discloses (vote, salt). The hash is recomputed over the original voter's
 * identity and the snapshotted weights are added to the matching tallies.
 * The caller then receives a fixed incentive from the proposal's balance
 * when enough is left above the reserve.
 */

import { governanceLogger as logger, type Hex32, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import {
  AuthorizationError,
  CryptoMismatchError,
  DuplicateError,
  StateError,
  ValidationError,
  WindowError,
} from "../errors/index.js";
import { checkedAddU64, checkedSubU64, isqrt } from "../math/index.js";
import { verifyCommitment } from "../commitment/index.js";
import { incentiveCreditCodec, recordKeys, voterRecordCodec } from "../codec/records.js";
import { readRecord, writeRecord, type RecordStore } from "../store/record-store.js";
import type { ConfigRegistry } from "../registry/config-registry.js";
import type { ProposalStore } from "../proposals/proposal-store.js";
import type { GovernanceConfig } from "../config.js";
import type { IncentiveCredit, Proposal, TokenBalanceSource, VoterRecord } from "../types.js";

const votingLogger = logger.child({ component: "commit-reveal" });

export interface CommitParams {
  proposal: string;
  commitment: Hex32;
  keeper?: Identity;
}

export interface RevealParams {
  proposal: string;
  voter: Identity;
  vote: boolean;
  salt: Hex32;
}

export interface WeightSnapshot {
  capital: bigint;
  community: bigint;
}

export interface RevealResult {
  proposal: Proposal;
  record: VoterRecord;
  incentivePaid: bigint;
}

type IncentiveSettings = Pick<GovernanceConfig, "revealRebate" | "rebateReserve">;

/**
 * Commits require an open proposal and a clock reading before voting_end.
 */
export function assertVotingOpen(proposal: Proposal, now: number): void {
  if (proposal.status !== "voting") {
    throw new StateError("VOTING_NOT_OPEN", "Proposal is not accepting votes", {
      status: proposal.status,
    });
  }
  if (now >= proposal.votingEnd) {
    throw new WindowError("VOTING_CLOSED", "Voting period has ended", {
      now,
      votingEnd: proposal.votingEnd,
    });
  }
}

export class CommitRevealEngine {
  constructor(
    private readonly store: RecordStore,
    private readonly registry: ConfigRegistry,
    private readonly proposals: ProposalStore,
    private readonly balances: TokenBalanceSource,
    private readonly incentive: IncentiveSettings
  ) {}

  // ============================================
  // COMMIT
  // ============================================

  commit(ctx: RequestContext, params: CommitParams): VoterRecord {
    const proposal = this.proposals.get(params.proposal);
    const dao = this.registry.get(proposal.dao);
    assertVotingOpen(proposal, ctx.now);

    const raw = this.balances.balanceOf(ctx.caller, dao.governanceToken);
    if (dao.requiredBalance > 0n && raw < dao.requiredBalance) {
      throw new ValidationError("INSUFFICIENT_TOKENS", "Balance is below the DAO's voting requirement", {
        required: dao.requiredBalance.toString(),
        balance: raw.toString(),
      });
    }

    return this.recordCommit(ctx, proposal, params, { capital: raw, community: isqrt(raw) }, false);
  }

  /**
   * Creates the caller's voter record with the given weights and counts the
   * commit. Shared by direct and delegated commits; window checks are the
   * caller's responsibility.
   */
  recordCommit(
    ctx: RequestContext,
    proposal: Proposal,
    params: CommitParams,
    weights: WeightSnapshot,
    delegated: boolean
  ): VoterRecord {
    const key = recordKeys.vote(proposal.key, ctx.caller);
    if (this.store.has(key)) {
      throw new DuplicateError("ALREADY_COMMITTED", "Voter has already committed on this proposal", {
        proposal: proposal.key,
        voter: ctx.caller,
      });
    }

    const record: VoterRecord = {
      voter: ctx.caller,
      proposal: proposal.key,
      commitment: params.commitment,
      capitalWeight: weights.capital,
      communityWeight: weights.community,
      hasCommitted: true,
      hasRevealed: false,
      votedYes: false,
      ...(params.keeper !== undefined ? { keeper: params.keeper } : {}),
    };
    writeRecord(this.store, voterRecordCodec, key, record);

    const commitCount = checkedAddU64(proposal.commitCount, 1n, "commitCount");
    this.proposals.save({ ...proposal, commitCount });

    ctx.events.stage({
      type: "vote.committed",
      payload: { proposal: proposal.key, voter: ctx.caller, commitCount, delegated },
    });
    votingLogger.info(
      { proposal: proposal.key, voter: ctx.caller, commitCount: commitCount.toString(), delegated },
      "Vote committed"
    );
    return record;
  }

  // ============================================
  // REVEAL
  // ============================================

  reveal(ctx: RequestContext, params: RevealParams): RevealResult {
    const proposal = this.proposals.get(params.proposal);

    if (ctx.now < proposal.votingEnd) {
      throw new WindowError("REVEAL_TOO_EARLY", "Reveal window has not opened", {
        now: ctx.now,
        votingEnd: proposal.votingEnd,
      });
    }
    if (ctx.now >= proposal.revealEnd) {
      throw new WindowError("REVEAL_CLOSED", "Reveal window has closed", {
        now: ctx.now,
        revealEnd: proposal.revealEnd,
      });
    }

    const key = recordKeys.vote(proposal.key, params.voter);
    const record = readRecord(this.store, voterRecordCodec, key);
    if (!record || !record.hasCommitted) {
      throw new StateError("NOT_COMMITTED", "No commitment found for this voter", {
        proposal: proposal.key,
        voter: params.voter,
      });
    }
    if (record.hasRevealed) {
      throw new DuplicateError("ALREADY_REVEALED", "Vote has already been revealed", {
        proposal: proposal.key,
        voter: params.voter,
      });
    }

    const isVoter = ctx.caller === record.voter;
    const isKeeper = record.keeper !== undefined && ctx.caller === record.keeper;
    if (!isVoter && !isKeeper) {
      throw new AuthorizationError("NOT_AUTHORIZED_TO_REVEAL", "Caller is neither the voter nor their keeper", {
        proposal: proposal.key,
        voter: record.voter,
      });
    }

    // The preimage always binds the original voter, even for keeper reveals
    if (!verifyCommitment(record.commitment, params.vote, params.salt, record.voter)) {
      throw new CryptoMismatchError("COMMITMENT_MISMATCH", "Revealed vote does not match the commitment", {
        proposal: proposal.key,
        voter: record.voter,
      });
    }

    const tallied: Proposal = params.vote
      ? {
          ...proposal,
          yesCapital: checkedAddU64(proposal.yesCapital, record.capitalWeight, "yesCapital"),
          yesCommunity: checkedAddU64(proposal.yesCommunity, record.communityWeight, "yesCommunity"),
        }
      : {
          ...proposal,
          noCapital: checkedAddU64(proposal.noCapital, record.capitalWeight, "noCapital"),
          noCommunity: checkedAddU64(proposal.noCommunity, record.communityWeight, "noCommunity"),
        };
    tallied.revealCount = checkedAddU64(proposal.revealCount, 1n, "revealCount");

    const revealed: VoterRecord = { ...record, hasRevealed: true, votedYes: params.vote };
    writeRecord(this.store, voterRecordCodec, key, revealed);

    ctx.events.stage({
      type: "vote.revealed",
      payload: {
        proposal: proposal.key,
        voter: record.voter,
        revealedBy: ctx.caller,
        revealCount: tallied.revealCount,
      },
    });

    const { proposal: updated, paid } = this.payIncentive(ctx, tallied);
    this.proposals.save(updated);
    votingLogger.info(
      {
        proposal: proposal.key,
        voter: record.voter,
        byKeeper: !isVoter,
        revealCount: updated.revealCount.toString(),
      },
      "Vote revealed"
    );

    return { proposal: updated, record: revealed, incentivePaid: paid };
  }

  // ============================================
  // INCENTIVE
  // ============================================

  /**
   * Moves the fixed rebate from the proposal to the caller's credit. Skipped,
   * never failed, when the balance would drop to the reserve or below.
   */
  private payIncentive(ctx: RequestContext, proposal: Proposal): { proposal: Proposal; paid: bigint } {
    const { revealRebate, rebateReserve } = this.incentive;
    if (revealRebate === 0n || proposal.incentiveBalance <= revealRebate + rebateReserve) {
      votingLogger.debug(
        { proposal: proposal.key, balance: proposal.incentiveBalance.toString() },
        "Reveal incentive skipped"
      );
      return { proposal, paid: 0n };
    }

    const key = recordKeys.incentive(ctx.caller);
    const credit = readRecord(this.store, incentiveCreditCodec, key) ?? { owner: ctx.caller, amount: 0n };
    writeRecord(this.store, incentiveCreditCodec, key, {
      owner: ctx.caller,
      amount: checkedAddU64(credit.amount, revealRebate, "incentiveCredit"),
    });

    ctx.events.stage({
      type: "incentive.paid",
      payload: { proposal: proposal.key, recipient: ctx.caller, amount: revealRebate },
    });
    return {
      proposal: {
        ...proposal,
        incentiveBalance: checkedSubU64(proposal.incentiveBalance, revealRebate, "incentiveBalance"),
      },
      paid: revealRebate,
    };
  }

  // ============================================
  // READS
  // ============================================

  findVoterRecord(proposal: string, voter: Identity): VoterRecord | undefined {
    return readRecord(this.store, voterRecordCodec, recordKeys.vote(proposal, voter));
  }

  readIncentiveCredit(owner: Identity): IncentiveCredit {
    return readRecord(this.store, incentiveCreditCodec, recordKeys.incentive(owner)) ?? { owner, amount: 0n };
  }
}
