/**
 * Delegation Ledger
 *
 * A delegator lends their weight (never a vote) to one delegatee for one
 * proposal. The delegatee commits once with their own weight plus the
 * delegated weight and picks the vote and salt themselves, so a delegated
 * commit is indistinguishable from a direct one until reveal.
 *
 * Quadratic weights are summed after the square root: isqrt(own) plus the
 * delegated isqrt(delegator), never isqrt(own + delegated).
 */

import { governanceLogger as logger, type Hex32, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import {
  AuthorizationError,
  DuplicateError,
  StateError,
  ValidationError,
} from "../errors/index.js";
import { checkedAddU64, isqrt } from "../math/index.js";
import { delegationCodec, recordKeys } from "../codec/records.js";
import { readRecord, writeRecord, type RecordStore } from "../store/record-store.js";
import type { ConfigRegistry } from "../registry/config-registry.js";
import type { ProposalStore } from "../proposals/proposal-store.js";
import { assertVotingOpen, type CommitRevealEngine } from "../voting/commit-reveal-engine.js";
import type { TokenBalanceSource, VoteDelegation, VoterRecord } from "../types.js";

const delegationLogger = logger.child({ component: "delegation-ledger" });

export interface DelegateParams {
  proposal: string;
  delegatee: Identity;
}

export interface CommitDelegatedParams {
  proposal: string;
  delegation: string;
  commitment: Hex32;
  keeper?: Identity;
}

export class DelegationLedger {
  constructor(
    private readonly store: RecordStore,
    private readonly registry: ConfigRegistry,
    private readonly proposals: ProposalStore,
    private readonly balances: TokenBalanceSource,
    private readonly voting: CommitRevealEngine
  ) {}

  delegate(ctx: RequestContext, params: DelegateParams): VoteDelegation {
    const proposal = this.proposals.get(params.proposal);
    const dao = this.registry.get(proposal.dao);
    assertVotingOpen(proposal, ctx.now);

    const raw = this.balances.balanceOf(ctx.caller, dao.governanceToken);
    if (raw === 0n) {
      throw new ValidationError("INSUFFICIENT_TOKENS", "Delegator holds no governance tokens");
    }

    const key = recordKeys.delegation(proposal.key, ctx.caller);
    if (this.store.has(key)) {
      throw new DuplicateError("DELEGATION_EXISTS", "Delegator already delegated on this proposal", {
        proposal: proposal.key,
        delegator: ctx.caller,
      });
    }

    const delegation: VoteDelegation = {
      key,
      delegator: ctx.caller,
      delegatee: params.delegatee,
      proposal: proposal.key,
      delegatedCapital: raw,
      delegatedCommunity: isqrt(raw),
      isUsed: false,
    };
    writeRecord(this.store, delegationCodec, key, delegation);

    ctx.events.stage({
      type: "vote.delegated",
      payload: {
        proposal: proposal.key,
        delegator: ctx.caller,
        delegatee: params.delegatee,
        delegatedWeight: raw,
      },
    });
    delegationLogger.info({ proposal: proposal.key, delegation: key }, "Weight delegated");
    return delegation;
  }

  commitDelegated(ctx: RequestContext, params: CommitDelegatedParams): VoterRecord {
    const proposal = this.proposals.get(params.proposal);
    const dao = this.registry.get(proposal.dao);
    assertVotingOpen(proposal, ctx.now);

    const delegation = this.find(params.delegation);
    if (!delegation) {
      throw new StateError("DELEGATION_NOT_FOUND", "Delegation not found", {
        delegation: params.delegation,
      });
    }
    if (delegation.delegatee !== ctx.caller) {
      throw new AuthorizationError("NOT_DELEGATEE", "Caller is not the designated delegatee", {
        delegation: params.delegation,
      });
    }
    if (delegation.proposal !== proposal.key) {
      throw new ValidationError("WRONG_PROPOSAL", "Delegation belongs to a different proposal", {
        delegation: params.delegation,
        proposal: proposal.key,
      });
    }
    if (delegation.isUsed) {
      throw new DuplicateError("DELEGATION_ALREADY_USED", "Delegation has already been consumed", {
        delegation: params.delegation,
      });
    }

    const own = this.balances.balanceOf(ctx.caller, dao.governanceToken);
    const weights = {
      capital: checkedAddU64(own, delegation.delegatedCapital, "combinedCapital"),
      community: checkedAddU64(isqrt(own), delegation.delegatedCommunity, "combinedCommunity"),
    };

    const record = this.voting.recordCommit(
      ctx,
      proposal,
      {
        proposal: proposal.key,
        commitment: params.commitment,
        ...(params.keeper !== undefined ? { keeper: params.keeper } : {}),
      },
      weights,
      true
    );
    writeRecord(this.store, delegationCodec, params.delegation, { ...delegation, isUsed: true });

    delegationLogger.info({ proposal: proposal.key, delegation: params.delegation }, "Delegation consumed");
    return record;
  }

  find(key: string): VoteDelegation | undefined {
    return readRecord(this.store, delegationCodec, key);
  }
}
