/**
 * Governance Event Log
 *
 * Append-only notification channel. Components stage events while a request
 * runs; the engine publishes them only after the request's writes commit.
 */

import { EventEmitter } from "eventemitter3";
import { governanceLogger, logError, type Identity } from "@sealvote/shared";
import type { TreasuryAction, VotingConfig } from "../types.js";

const eventLogger = governanceLogger.child({ component: "event-log" });

// ============================================
// EVENT PAYLOADS
// ============================================

export interface GovernanceEventPayloads {
  "dao.created": { dao: string; name: string; authority: Identity; votingConfig: VotingConfig };
  "dao.migrated": { dao: string; name: string; migratedFrom: Identity; governanceToken: Identity };
  "proposal.created": {
    dao: string;
    proposal: string;
    proposalId: bigint;
    title: string;
    votingEnd: number;
    revealEnd: number;
  };
  "proposal.cancelled": { proposal: string; cancelledBy: Identity };
  "proposal.vetoed": { proposal: string; vetoedBy: Identity };
  "vote.delegated": { proposal: string; delegator: Identity; delegatee: Identity; delegatedWeight: bigint };
  "vote.committed": { proposal: string; voter: Identity; commitCount: bigint; delegated: boolean };
  "vote.revealed": { proposal: string; voter: Identity; revealedBy: Identity; revealCount: bigint };
  "incentive.paid": { proposal: string; recipient: Identity; amount: bigint };
  "proposal.finalized": {
    proposal: string;
    passed: boolean;
    quorumMet: boolean;
    yesCapital: bigint;
    noCapital: bigint;
    yesCommunity: bigint;
    noCommunity: bigint;
    commitCount: bigint;
    revealCount: bigint;
    executionUnlocksAt: number;
  };
  "treasury.deposit": { dao: string; from: Identity; amount: bigint; tokenMint?: Identity };
  // reference is absent for custom actions, which are relayed rather than transferred
  "treasury.executed": { proposal: string; action: TreasuryAction; reference?: string };
  "treasury.transfer_failed": { proposal: string; action: TreasuryAction; reason: string };
  "voter_weight.synced": { realm: Identity; owner: Identity; weight: bigint; expiry: bigint };
}

export type GovernanceEventType = keyof GovernanceEventPayloads;

export interface GovernanceEvent<K extends GovernanceEventType = GovernanceEventType> {
  sequence: number;
  type: K;
  at: number;
  payload: GovernanceEventPayloads[K];
}

export type StagedEvent = {
  [K in GovernanceEventType]: { type: K; payload: GovernanceEventPayloads[K] };
}[GovernanceEventType];

export interface GovernanceEventLogEvents {
  event: (event: GovernanceEvent) => void;
}

// ============================================
// EVENT LOG
// ============================================

export class GovernanceEventLog extends EventEmitter<GovernanceEventLogEvents> {
  private readonly entries: GovernanceEvent[] = [];

  /**
   * Appends committed events in order, then notifies subscribers. The
   * request has already committed, so a throwing subscriber is logged and
   * the remaining events are still delivered.
   */
  publish(staged: readonly StagedEvent[], at: number): GovernanceEvent[] {
    const published = staged.map((event, index): GovernanceEvent => ({
      sequence: this.entries.length + index + 1,
      type: event.type,
      at,
      payload: event.payload,
    }));
    this.entries.push(...published);

    for (const entry of published) {
      try {
        this.emit("event", entry);
      } catch (error) {
        logError(error, { sequence: entry.sequence, eventType: entry.type }, "Event subscriber failed", eventLogger);
      }
    }
    return published;
  }

  list(type?: GovernanceEventType): GovernanceEvent[] {
    return type === undefined ? [...this.entries] : this.entries.filter((e) => e.type === type);
  }

  get length(): number {
    return this.entries.length;
  }
}

/**
 * Collects events raised while a request is in flight.
 */
export class EventBuffer {
  private readonly staged: StagedEvent[] = [];

  stage(event: StagedEvent): void {
    this.staged.push(event);
  }

  drain(): StagedEvent[] {
    return this.staged.splice(0, this.staged.length);
  }
}
