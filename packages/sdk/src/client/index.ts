/**
 * SealVote Client
 *
 * Identity-bound wrapper over a governance engine. Commits draw a fresh
 * salt and persist a receipt first; reveals read the salt back.
 */

import type {
  GovernanceEngine,
  GovernanceEvent,
  RevealResult,
  VoteDelegation,
  VoterRecord,
} from "@sealvote/governance";
import { logError, sdkLogger } from "@sealvote/shared";
import { buildCommitment, generateSalt } from "../commitment/index.js";
import { createConfig, type SealVoteSDKConfig } from "../config.js";
import {
  FileReceiptStore,
  markRevealed,
  type ReceiptStore,
  type VoteReceipt,
} from "../receipts/index.js";

const clientLogger = sdkLogger.child({ component: "client" });

export interface SealVoteClientOptions {
  engine: GovernanceEngine;
  identity: string;
  /** Defaults to a FileReceiptStore under the configured receiptDir */
  receipts?: ReceiptStore;
  config?: SealVoteSDKConfig;
}

export interface CommitOptions {
  keeper?: string;
}

export class ReceiptNotFoundError extends Error {
  constructor(
    public readonly proposal: string,
    public readonly voter: string
  ) {
    super(`No vote receipt for voter ${voter} on proposal ${proposal}`);
    this.name = "ReceiptNotFoundError";
  }
}

export class ReceiptExistsError extends Error {
  constructor(
    public readonly proposal: string,
    public readonly voter: string
  ) {
    super(`Voter ${voter} already holds a receipt for proposal ${proposal}`);
    this.name = "ReceiptExistsError";
  }
}

export class SealVoteClient {
  private readonly engine: GovernanceEngine;
  private readonly identity: string;
  readonly receipts: ReceiptStore;

  constructor(options: SealVoteClientOptions) {
    this.engine = options.engine;
    this.identity = options.identity.toLowerCase();
    this.receipts = options.receipts ?? new FileReceiptStore(createConfig(options.config).receiptDir);
  }

  get address(): string {
    return this.identity;
  }

  // ============================================
  // VOTING
  // ============================================

  async commit(proposal: string, vote: boolean, options: CommitOptions = {}): Promise<VoterRecord> {
    const receipt = await this.prepareReceipt(proposal, vote, false, options.keeper);
    return this.submit(receipt, () =>
      this.engine.commitVote({
        caller: this.identity,
        proposal,
        commitment: receipt.commitment,
        keeper: options.keeper,
      })
    );
  }

  async commitDelegated(
    proposal: string,
    delegation: string,
    vote: boolean,
    options: CommitOptions = {}
  ): Promise<VoterRecord> {
    const receipt = await this.prepareReceipt(proposal, vote, true, options.keeper);
    return this.submit(receipt, () =>
      this.engine.commitDelegatedVote({
        caller: this.identity,
        proposal,
        delegation,
        commitment: receipt.commitment,
        keeper: options.keeper,
      })
    );
  }

  delegate(proposal: string, delegatee: string): VoteDelegation {
    return this.engine.delegate({ caller: this.identity, proposal, delegatee });
  }

  /**
   * Reveals this identity's own vote from its stored receipt.
   */
  async reveal(proposal: string): Promise<RevealResult> {
    const receipt = await this.receipts.load(proposal, this.identity);
    if (!receipt) {
      throw new ReceiptNotFoundError(proposal, this.identity);
    }
    return this.revealFor(receipt);
  }

  /**
   * Reveals a receipt handed over by a voter. The caller must be the voter
   * or the keeper named at commit.
   */
  async revealFor(receipt: VoteReceipt): Promise<RevealResult> {
    const result = this.engine.revealVote({
      caller: this.identity,
      proposal: receipt.proposal,
      voter: receipt.voter,
      vote: receipt.vote,
      salt: receipt.salt,
    });
    await markRevealed(this.receipts, receipt);

    clientLogger.info(
      { proposal: receipt.proposal, voter: receipt.voter, incentivePaid: result.incentivePaid.toString() },
      "Vote revealed"
    );
    return result;
  }

  async pendingReveals(): Promise<VoteReceipt[]> {
    const receipts = await this.receipts.list();
    return receipts.filter((receipt) => receipt.revealedAt === undefined);
  }

  // ============================================
  // EVENTS
  // ============================================

  /**
   * Subscribes to committed engine events. A throwing handler is logged
   * and does not reach the engine. Returns an unsubscribe function.
   */
  on(handler: (event: GovernanceEvent) => void): () => void {
    const listener = (event: GovernanceEvent) => {
      try {
        handler(event);
      } catch (error) {
        logError(error, { eventType: event.type }, "Event handler failed", clientLogger);
      }
    };
    this.engine.events.on("event", listener);
    return () => {
      this.engine.events.off("event", listener);
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async prepareReceipt(
    proposal: string,
    vote: boolean,
    delegated: boolean,
    keeper: string | undefined
  ): Promise<VoteReceipt> {
    // Never overwrite a salt that a committed vote still depends on
    if (await this.receipts.load(proposal, this.identity)) {
      throw new ReceiptExistsError(proposal, this.identity);
    }

    const salt = generateSalt();
    const receipt: VoteReceipt = {
      proposal: proposal.toLowerCase(),
      voter: this.identity,
      vote,
      salt,
      commitment: buildCommitment(vote, salt, this.identity),
      keeper: keeper?.toLowerCase(),
      delegated,
      committedAt: new Date().toISOString(),
    };
    await this.receipts.save(receipt);
    return receipt;
  }

  private async submit(receipt: VoteReceipt, send: () => VoterRecord): Promise<VoterRecord> {
    try {
      const record = send();
      clientLogger.info(
        { proposal: receipt.proposal, voter: receipt.voter, delegated: receipt.delegated },
        "Vote committed"
      );
      return record;
    } catch (error) {
      await this.receipts.remove(receipt.proposal, receipt.voter);
      throw error;
    }
  }
}

export function createSealVoteClient(options: SealVoteClientOptions): SealVoteClient {
  return new SealVoteClient(options);
}
