/**
 * Timelock Controller
 *
 * Execution runs in two steps:
 *   1. authorize()  inside the request transaction: checks the gate,
 *                   re-validates the payload, sets isExecuted
 *   2. handOff()    after commit: calls the treasury gateway
 *
 * Because the flag is committed before the gateway runs, a failed transfer
 * is never retried by calling execute again.
 */

import { governanceLogger as logger, logError, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { StateError, ValidationError, WindowError } from "../errors/index.js";
import type { ProposalStore } from "../proposals/proposal-store.js";
import { validateTreasuryAction } from "../proposals/treasury-action.js";
import type { TreasuryGateway } from "../treasury/treasury-gateway.js";
import type { Proposal, TreasuryAction } from "../types.js";

const timelockLogger = logger.child({ component: "timelock" });

export interface AuthorizedExecution {
  proposal: Proposal;
  action?: TreasuryAction;
}

export type ExecutionOutcome =
  | { proposal: string; transfer: "none" }
  | { proposal: string; transfer: "relayed"; action: TreasuryAction }
  | { proposal: string; transfer: "completed"; action: TreasuryAction; reference: string }
  | { proposal: string; transfer: "failed"; action: TreasuryAction; reason: string };

export class TimelockController {
  constructor(
    private readonly proposals: ProposalStore,
    private readonly gateway: TreasuryGateway
  ) {}

  authorize(ctx: RequestContext, key: string, target?: Identity): AuthorizedExecution {
    const proposal = this.proposals.get(key);

    if (proposal.status !== "passed") {
      throw new StateError("PROPOSAL_NOT_PASSED", "Only a passed proposal can be executed", {
        status: proposal.status,
      });
    }
    if (proposal.isExecuted) {
      throw new StateError("ALREADY_EXECUTED", "Proposal has already been executed");
    }
    if (ctx.now < proposal.executionUnlocksAt) {
      throw new WindowError("EXECUTION_TIMELOCK_ACTIVE", "Execution timelock has not expired", {
        now: ctx.now,
        executionUnlocksAt: proposal.executionUnlocksAt,
      });
    }

    let action: TreasuryAction | undefined;
    if (proposal.treasuryAction !== undefined) {
      action = validateTreasuryAction(proposal.treasuryAction);
      if (target !== action.recipient) {
        throw new ValidationError("TREASURY_RECIPIENT_MISMATCH", "Target does not match the action recipient", {
          proposal: key,
        });
      }
    }

    const executed: Proposal = { ...proposal, isExecuted: true };
    this.proposals.save(executed);
    timelockLogger.info({ proposal: key, action: action?.kind ?? "none" }, "Execution authorized");

    return { proposal: executed, ...(action !== undefined ? { action } : {}) };
  }

  /**
   * Performs the authorized action. A gateway failure is reported in the
   * outcome; the proposal stays executed.
   */
  handOff(ctx: RequestContext, authorized: AuthorizedExecution): ExecutionOutcome {
    const { proposal, action } = authorized;

    if (action === undefined) {
      return { proposal: proposal.key, transfer: "none" };
    }

    if (action.kind === "custom") {
      ctx.events.stage({ type: "treasury.executed", payload: { proposal: proposal.key, action } });
      timelockLogger.info({ proposal: proposal.key }, "Custom action released for relay");
      return { proposal: proposal.key, transfer: "relayed", action };
    }

    try {
      const receipt = this.gateway.transfer({ dao: proposal.dao, proposal: proposal.key, action });
      ctx.events.stage({
        type: "treasury.executed",
        payload: { proposal: proposal.key, action, reference: receipt.reference },
      });
      return { proposal: proposal.key, transfer: "completed", action, reference: receipt.reference };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logError(error, { proposal: proposal.key, action: action.kind }, "Treasury transfer failed", timelockLogger);
      ctx.events.stage({
        type: "treasury.transfer_failed",
        payload: { proposal: proposal.key, action, reason },
      });
      return { proposal: proposal.key, transfer: "failed", action, reason };
    }
  }
}
