/**
 * Tally Evaluator
 *
 * Quorum counts voters, not weight: revealers must make up at least
 * quorumPercentage of committers. Only when quorum holds is the voting mode's
 * pass rule applied:
 *
 *   token_weighted  yes_capital > no_capital
 *   quadratic       yes_community > no_community
 *   dual_chamber    each chamber's yes share >= its own threshold
 *
 * All comparisons are cross-multiplied integers; there is no rounding.
 */

import { governanceLogger as logger } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { StateError, WindowError } from "../errors/index.js";
import { checkedAddSeconds } from "../math/index.js";
import type { ConfigRegistry } from "../registry/config-registry.js";
import type { ProposalStore } from "../proposals/proposal-store.js";
import type { Proposal, Tally, VotingConfig } from "../types.js";

const tallyLogger = logger.child({ component: "tally-evaluator" });

export interface TallyEvaluation {
  quorumMet: boolean;
  passed: boolean;
  // Only for dual_chamber, and only once quorum is met
  capitalPasses?: boolean;
  communityPasses?: boolean;
}

function meetsThreshold(yes: bigint, no: bigint, thresholdPercentage: number): boolean {
  const total = yes + no;
  return total > 0n && yes * 100n >= total * BigInt(thresholdPercentage);
}

function majority(yes: bigint, no: bigint): boolean {
  return yes + no > 0n && yes > no;
}

export function isQuorumMet(tally: Pick<Tally, "commitCount" | "revealCount">, quorumPercentage: number): boolean {
  return tally.commitCount > 0n && tally.revealCount * 100n >= tally.commitCount * BigInt(quorumPercentage);
}

/**
 * Pure pass/fail decision over a tally snapshot.
 */
export function evaluateTally(tally: Tally, quorumPercentage: number, votingConfig: VotingConfig): TallyEvaluation {
  const quorumMet = isQuorumMet(tally, quorumPercentage);
  if (!quorumMet) {
    return { quorumMet, passed: false };
  }

  switch (votingConfig.kind) {
    case "token_weighted":
      return { quorumMet, passed: majority(tally.yesCapital, tally.noCapital) };
    case "quadratic":
      return { quorumMet, passed: majority(tally.yesCommunity, tally.noCommunity) };
    case "dual_chamber": {
      const capitalPasses = meetsThreshold(tally.yesCapital, tally.noCapital, votingConfig.capitalThreshold);
      const communityPasses = meetsThreshold(
        tally.yesCommunity,
        tally.noCommunity,
        votingConfig.communityThreshold
      );
      return { quorumMet, passed: capitalPasses && communityPasses, capitalPasses, communityPasses };
    }
  }
}

export class TallyEvaluator {
  constructor(
    private readonly registry: ConfigRegistry,
    private readonly proposals: ProposalStore
  ) {}

  /**
   * Closes a proposal once its reveal window has ended. Permissionless.
   */
  finalize(ctx: RequestContext, key: string): { proposal: Proposal; evaluation: TallyEvaluation } {
    const proposal = this.proposals.get(key);

    if (ctx.now < proposal.revealEnd) {
      throw new WindowError("REVEAL_STILL_OPEN", "Reveal window is still open", {
        now: ctx.now,
        revealEnd: proposal.revealEnd,
      });
    }
    if (proposal.status !== "voting") {
      throw new StateError("ALREADY_FINALIZED", "Proposal has already been finalized", {
        status: proposal.status,
      });
    }

    const dao = this.registry.get(proposal.dao);
    const evaluation = evaluateTally(proposal, dao.quorumPercentage, dao.votingConfig);

    const finalized: Proposal = evaluation.passed
      ? {
          ...proposal,
          status: "passed",
          executionUnlocksAt: checkedAddSeconds(ctx.now, dao.executionDelaySeconds, "executionUnlocksAt"),
        }
      : { ...proposal, status: "failed" };
    this.proposals.save(finalized);

    ctx.events.stage({
      type: "proposal.finalized",
      payload: {
        proposal: key,
        passed: evaluation.passed,
        quorumMet: evaluation.quorumMet,
        yesCapital: finalized.yesCapital,
        noCapital: finalized.noCapital,
        yesCommunity: finalized.yesCommunity,
        noCommunity: finalized.noCommunity,
        commitCount: finalized.commitCount,
        revealCount: finalized.revealCount,
        executionUnlocksAt: finalized.executionUnlocksAt,
      },
    });
    tallyLogger.info(
      { proposal: key, status: finalized.status, quorumMet: evaluation.quorumMet },
      "Proposal finalized"
    );

    return { proposal: finalized, evaluation };
  }
}
