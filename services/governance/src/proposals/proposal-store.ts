/**
 * Proposal Store
 *
 * Lifecycle:
 *   voting --finalize--> passed | failed
 *   voting --cancel----> cancelled          (authority)
 *   passed --veto------> vetoed             (authority, before unlock)
 *   passed --execute---> passed + executed
 */

import { governanceLogger as logger, LIMITS, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { AuthorizationError, StateError, ValidationError, WindowError } from "../errors/index.js";
import { checkedAddSeconds } from "../math/index.js";
import { proposalCodec, recordKeys } from "../codec/records.js";
import { readRecord, writeRecord, type RecordStore } from "../store/record-store.js";
import type { ConfigRegistry } from "../registry/config-registry.js";
import type { TreasuryGateway } from "../treasury/treasury-gateway.js";
import type { DaoConfig, Proposal, TreasuryActionInput } from "../types.js";
import { validateTreasuryAction } from "./treasury-action.js";

const proposalLogger = logger.child({ component: "proposal-store" });

export interface CreateProposalParams {
  dao: string;
  title: string;
  description: string;
  votingDurationSeconds: number;
  treasuryAction?: TreasuryActionInput;
  incentiveDeposit: bigint;
}

export class ProposalStore {
  constructor(
    private readonly store: RecordStore,
    private readonly registry: ConfigRegistry,
    private readonly treasury: TreasuryGateway
  ) {}

  create(ctx: RequestContext, params: CreateProposalParams): Proposal {
    const dao = this.registry.get(params.dao);

    if (Buffer.byteLength(params.title, "utf8") > LIMITS.maxTitleLength) {
      throw new ValidationError("TITLE_TOO_LONG", `Title exceeds ${LIMITS.maxTitleLength} bytes`);
    }
    if (Buffer.byteLength(params.description, "utf8") > LIMITS.maxDescriptionLength) {
      throw new ValidationError(
        "DESCRIPTION_TOO_LONG",
        `Description exceeds ${LIMITS.maxDescriptionLength} bytes`
      );
    }
    if (params.votingDurationSeconds < LIMITS.minVotingDurationSeconds) {
      throw new ValidationError(
        "VOTING_DURATION_TOO_SHORT",
        `Voting duration must be at least ${LIMITS.minVotingDurationSeconds} seconds`,
        { votingDurationSeconds: params.votingDurationSeconds }
      );
    }

    const available = this.treasury.walletBalance(ctx.caller);
    if (params.incentiveDeposit > available) {
      throw new ValidationError(
        "INSUFFICIENT_FUNDS",
        `Incentive deposit of ${params.incentiveDeposit} exceeds the proposer's ${available}`,
        { incentiveDeposit: params.incentiveDeposit, available }
      );
    }

    const treasuryAction =
      params.treasuryAction !== undefined ? validateTreasuryAction(params.treasuryAction) : undefined;
    const votingEnd = checkedAddSeconds(ctx.now, params.votingDurationSeconds, "votingEnd");
    const revealEnd = checkedAddSeconds(votingEnd, dao.revealWindowSeconds, "revealEnd");
    const proposalId = this.registry.nextProposalId(dao);

    const proposal: Proposal = {
      key: recordKeys.proposal(dao.key, proposalId),
      dao: dao.key,
      proposer: ctx.caller,
      proposalId,
      title: params.title,
      description: params.description,
      status: "voting",
      votingEnd,
      revealEnd,
      yesCapital: 0n,
      noCapital: 0n,
      yesCommunity: 0n,
      noCommunity: 0n,
      commitCount: 0n,
      revealCount: 0n,
      ...(treasuryAction !== undefined ? { treasuryAction } : {}),
      executionUnlocksAt: 0,
      isExecuted: false,
      incentiveBalance: params.incentiveDeposit,
    };
    this.save(proposal);

    ctx.events.stage({
      type: "proposal.created",
      payload: {
        dao: dao.key,
        proposal: proposal.key,
        proposalId,
        title: proposal.title,
        votingEnd,
        revealEnd,
      },
    });

    // Funds move only once every check above has passed
    if (params.incentiveDeposit > 0n) {
      this.treasury.escrowIncentive({
        proposal: proposal.key,
        from: ctx.caller,
        amount: params.incentiveDeposit,
      });
    }

    proposalLogger.info(
      { proposal: proposal.key, proposalId: proposalId.toString(), votingEnd, revealEnd },
      "Proposal created"
    );
    return proposal;
  }

  cancel(ctx: RequestContext, key: string): Proposal {
    const proposal = this.get(key);
    this.requireAuthority(ctx.caller, this.registry.get(proposal.dao));

    if (proposal.status !== "voting") {
      throw new StateError("PROPOSAL_NOT_CANCELLABLE", "Only a proposal in voting can be cancelled", {
        status: proposal.status,
      });
    }

    const cancelled: Proposal = { ...proposal, status: "cancelled" };
    this.save(cancelled);

    ctx.events.stage({ type: "proposal.cancelled", payload: { proposal: key, cancelledBy: ctx.caller } });
    proposalLogger.info({ proposal: key }, "Proposal cancelled");
    return cancelled;
  }

  veto(ctx: RequestContext, key: string): Proposal {
    const proposal = this.get(key);
    this.requireAuthority(ctx.caller, this.registry.get(proposal.dao));

    if (proposal.status !== "passed") {
      throw new StateError("PROPOSAL_NOT_PASSED", "Only a passed proposal can be vetoed", {
        status: proposal.status,
      });
    }
    if (proposal.isExecuted) {
      throw new WindowError("ALREADY_EXECUTED", "Proposal has already been executed");
    }
    if (ctx.now >= proposal.executionUnlocksAt) {
      throw new WindowError("VETO_WINDOW_EXPIRED", "Veto window has closed", {
        now: ctx.now,
        executionUnlocksAt: proposal.executionUnlocksAt,
      });
    }

    const vetoed: Proposal = { ...proposal, status: "vetoed" };
    this.save(vetoed);

    ctx.events.stage({ type: "proposal.vetoed", payload: { proposal: key, vetoedBy: ctx.caller } });
    proposalLogger.warn({ proposal: key }, "Proposal vetoed");
    return vetoed;
  }

  find(key: string): Proposal | undefined {
    return readRecord(this.store, proposalCodec, key);
  }

  get(key: string): Proposal {
    const proposal = this.find(key);
    if (!proposal) {
      throw new StateError("PROPOSAL_NOT_FOUND", "Proposal not found", { proposal: key });
    }
    return proposal;
  }

  save(proposal: Proposal): void {
    writeRecord(this.store, proposalCodec, proposal.key, proposal);
  }

  private requireAuthority(caller: Identity, dao: DaoConfig): void {
    if (caller !== dao.authority) {
      throw new AuthorizationError("NOT_AUTHORITY", "Only the DAO authority may do this", {
        dao: dao.key,
      });
    }
  }
}
