/**
 * Proposal Lifecycle Tests
 *
 * Creation, cancellation, finalization, veto and timelocked execution
 * through the engine's request surface.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { recordKeys } from "../codec/records.js";
import type { CreateProposalRequest } from "../schemas.js";
import {
  ALICE,
  AUTHORITY,
  BOB,
  EXECUTION_DELAY,
  KEEPER,
  OUTSIDER,
  RECIPIENT,
  REVEAL_END,
  SALT_A,
  SALT_B,
  START,
  VOTING_END,
  WALLET,
  codeOf,
  commit,
  createDao,
  createHarness,
  createProposal,
  id,
  passProposal,
  reveal,
  type Harness,
} from "./helpers.js";

describe("Proposal lifecycle", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  // ============================================
  // END TO END
  // ============================================

  it("should run a dual-chamber proposal from creation to execution", () => {
    const dao = createDao(h, {
      votingConfig: { kind: "dual_chamber", capitalThreshold: 60, communityThreshold: 40 },
    });
    h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 10_000n });
    const proposal = createProposal(h, dao, {
      treasuryAction: { kind: "send_native", amount: 1_000n, recipient: RECIPIENT },
    });

    commit(h, proposal, ALICE, true, SALT_A, KEEPER);
    commit(h, proposal, BOB, false, SALT_B);

    h.clock.set(VOTING_END);
    reveal(h, proposal, ALICE, true, SALT_A, KEEPER);
    reveal(h, proposal, BOB, false, SALT_B);

    h.clock.set(REVEAL_END);
    const { proposal: finalized, evaluation } = h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });

    expect(evaluation).toEqual({ quorumMet: true, passed: true, capitalPasses: true, communityPasses: true });
    expect(finalized.status).toBe("passed");
    expect(finalized.yesCapital).toBe(1_000_000n);
    expect(finalized.noCapital).toBe(250_000n);
    expect(finalized.yesCommunity).toBe(1000n);
    expect(finalized.noCommunity).toBe(500n);
    expect(finalized.executionUnlocksAt).toBe(START + 4200 + 86_400);

    h.clock.set(finalized.executionUnlocksAt);
    const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

    expect(outcome).toMatchObject({ transfer: "completed", reference: expect.stringMatching(/^xfer_/) });
    expect(h.treasury.balanceOf(dao.key)).toBe(9_000n);
    expect(h.engine.getProposal(proposal.key)?.isExecuted).toBe(true);
    expect(h.engine.events.list().map((e) => e.type)).toEqual([
      "dao.created",
      "treasury.deposit",
      "proposal.created",
      "vote.committed",
      "vote.committed",
      "vote.revealed",
      "vote.revealed",
      "proposal.finalized",
      "treasury.executed",
    ]);
  });

  // ============================================
  // CREATION
  // ============================================

  describe("createProposal", () => {
    it("should set the windows from the creation time", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);

      expect(proposal.proposer).toBe(ALICE);
      expect(proposal.status).toBe("voting");
      expect(proposal.votingEnd).toBe(START + 600);
      expect(proposal.revealEnd).toBe(START + 600 + 3600);
      expect(proposal.executionUnlocksAt).toBe(0);
      expect(proposal.treasuryAction).toBeUndefined();
    });

    it("should number proposals per DAO", () => {
      const dao = createDao(h);
      const first = createProposal(h, dao);
      const second = createProposal(h, dao, { caller: BOB });

      expect(first.proposalId).toBe(0n);
      expect(second.proposalId).toBe(1n);
      expect(second.key).toBe(recordKeys.proposal(dao.key, 1n));
      expect(h.engine.getDao(dao.key)?.proposalCount).toBe(2n);
    });

    it("should reject a missing DAO", () => {
      const dao = createDao(h);
      expect(codeOf(() => createProposal(h, { ...dao, key: id("ee") }))).toBe("DAO_NOT_FOUND");
    });

    it("should enforce the text limits in bytes", () => {
      const dao = createDao(h);
      expect(codeOf(() => createProposal(h, dao, { title: "t".repeat(129) }))).toBe("TITLE_TOO_LONG");
      expect(codeOf(() => createProposal(h, dao, { description: "d".repeat(1025) }))).toBe(
        "DESCRIPTION_TOO_LONG"
      );
      expect(createProposal(h, dao, { title: "t".repeat(128) }).title).toHaveLength(128);
    });

    it("should reject a voting duration under 5 seconds", () => {
      const dao = createDao(h);
      expect(codeOf(() => createProposal(h, dao, { votingDurationSeconds: 4 }))).toBe(
        "VOTING_DURATION_TOO_SHORT"
      );
    });

    it("should validate the treasury action shape", () => {
      const dao = createDao(h);
      const propose = (treasuryAction: CreateProposalRequest["treasuryAction"]) => () =>
        createProposal(h, dao, { treasuryAction });

      expect(codeOf(propose({ kind: "send_native", amount: 0n, recipient: RECIPIENT }))).toBe(
        "INVALID_TREASURY_ACTION"
      );
      expect(codeOf(propose({ kind: "send_native", amount: 1n, recipient: `0x${"00".repeat(32)}` }))).toBe(
        "INVALID_TREASURY_ACTION"
      );
      expect(codeOf(propose({ kind: "send_token", amount: 1n, recipient: RECIPIENT }))).toBe(
        "TOKEN_MINT_REQUIRED"
      );
      expect(codeOf(propose({ kind: "custom", amount: 5n, recipient: RECIPIENT }))).toBe(
        "INVALID_TREASURY_ACTION"
      );
      expect(h.engine.getDao(dao.key)?.proposalCount).toBe(0n);
    });

    it("should escrow the incentive deposit from the proposer's wallet", () => {
      const proposal = createProposal(h, createDao(h), { incentiveDeposit: 4_000_000n });

      expect(proposal.incentiveBalance).toBe(4_000_000n);
      expect(h.treasury.walletBalance(ALICE)).toBe(WALLET - 4_000_000n);
      expect(h.treasury.escrowOf(proposal.key)).toBe(4_000_000n);
    });

    it("should reject an incentive deposit the proposer cannot cover", () => {
      const dao = createDao(h);

      expect(codeOf(() => createProposal(h, dao, { caller: BOB, incentiveDeposit: 10n ** 18n }))).toBe(
        "INSUFFICIENT_FUNDS"
      );
      expect(codeOf(() => createProposal(h, dao, { incentiveDeposit: WALLET + 1n }))).toBe("INSUFFICIENT_FUNDS");
      expect(h.engine.getDao(dao.key)?.proposalCount).toBe(0n);
      expect(h.treasury.walletBalance(ALICE)).toBe(WALLET);
      expect(h.engine.events.list("proposal.created")).toHaveLength(0);
    });

    it("should not touch the wallet when no incentive is deposited", () => {
      const proposal = createProposal(h, createDao(h), { caller: BOB });

      expect(proposal.incentiveBalance).toBe(0n);
      expect(h.treasury.escrowOf(proposal.key)).toBe(0n);
    });
  });

  // ============================================
  // CANCEL
  // ============================================

  describe("cancelProposal", () => {
    it("should let the authority cancel a proposal in voting", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);

      const cancelled = h.engine.cancelProposal({ caller: AUTHORITY, proposal: proposal.key });

      expect(cancelled.status).toBe("cancelled");
      expect(codeOf(() => commit(h, proposal, BOB, true, SALT_B))).toBe("VOTING_NOT_OPEN");
    });

    it("should reject anyone but the authority", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);

      expect(codeOf(() => h.engine.cancelProposal({ caller: ALICE, proposal: proposal.key }))).toBe(
        "NOT_AUTHORITY"
      );
    });

    it("should reject cancelling a finalized proposal", () => {
      const { proposal } = passProposal(h);

      expect(codeOf(() => h.engine.cancelProposal({ caller: AUTHORITY, proposal: proposal.key }))).toBe(
        "PROPOSAL_NOT_CANCELLABLE"
      );
    });
  });

  // ============================================
  // FINALIZE
  // ============================================

  describe("finalize", () => {
    it("should refuse while the reveal window is open", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);
      h.clock.set(REVEAL_END - 1);

      expect(codeOf(() => h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key }))).toBe(
        "REVEAL_STILL_OPEN"
      );
    });

    it("should fail a proposal nobody voted on", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);
      h.clock.set(REVEAL_END);

      const { proposal: finalized, evaluation } = h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });

      expect(evaluation).toEqual({ quorumMet: false, passed: false });
      expect(finalized.status).toBe("failed");
      expect(finalized.executionUnlocksAt).toBe(0);
    });

    it("should fail when too few committers reveal", () => {
      const dao = createDao(h, { quorumPercentage: 100 });
      const proposal = createProposal(h, dao);
      commit(h, proposal, ALICE, true, SALT_A);
      commit(h, proposal, BOB, false, SALT_B);
      h.clock.set(VOTING_END);
      reveal(h, proposal, ALICE, true, SALT_A);
      h.clock.set(REVEAL_END);

      const { proposal: finalized } = h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });

      expect(finalized.status).toBe("failed");
      expect(finalized.yesCapital).toBe(1_000_000n);
    });

    it("should finalize only once", () => {
      const { proposal } = passProposal(h);

      expect(codeOf(() => h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key }))).toBe(
        "ALREADY_FINALIZED"
      );
    });
  });

  // ============================================
  // VETO
  // ============================================

  describe("vetoProposal", () => {
    it("should let the authority veto until the timelock expires", () => {
      const { proposal, unlocksAt } = passProposal(h);
      h.clock.set(unlocksAt - 1);

      const vetoed = h.engine.vetoProposal({ caller: AUTHORITY, proposal: proposal.key });

      expect(vetoed.status).toBe("vetoed");
      h.clock.set(unlocksAt);
      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT }))).toBe(
        "PROPOSAL_NOT_PASSED"
      );
    });

    it("should close the veto window at unlock", () => {
      const { proposal, unlocksAt } = passProposal(h);
      h.clock.set(unlocksAt);

      expect(codeOf(() => h.engine.vetoProposal({ caller: AUTHORITY, proposal: proposal.key }))).toBe(
        "VETO_WINDOW_EXPIRED"
      );
    });

    it("should reject anyone but the authority", () => {
      const { proposal } = passProposal(h);

      expect(codeOf(() => h.engine.vetoProposal({ caller: ALICE, proposal: proposal.key }))).toBe(
        "NOT_AUTHORITY"
      );
    });

    it("should reject vetoing a proposal that has not passed", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);

      expect(codeOf(() => h.engine.vetoProposal({ caller: AUTHORITY, proposal: proposal.key }))).toBe(
        "PROPOSAL_NOT_PASSED"
      );
    });

    it("should reject vetoing an executed proposal", () => {
      const dao = createDao(h, { executionDelaySeconds: 0 });
      const proposal = createProposal(h, dao);
      commit(h, proposal, ALICE, true, SALT_A);
      h.clock.set(VOTING_END);
      reveal(h, proposal, ALICE, true, SALT_A);
      h.clock.set(REVEAL_END);
      h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });
      h.engine.execute({ caller: OUTSIDER, proposal: proposal.key });

      expect(codeOf(() => h.engine.vetoProposal({ caller: AUTHORITY, proposal: proposal.key }))).toBe(
        "ALREADY_EXECUTED"
      );
    });
  });

  // ============================================
  // EXECUTE
  // ============================================

  describe("execute", () => {
    it("should hold execution until the timelock expires", () => {
      const { dao, proposal, unlocksAt } = passProposal(h);
      h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 5_000n });
      h.clock.set(unlocksAt - 1);

      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT }))).toBe(
        "EXECUTION_TIMELOCK_ACTIVE"
      );
      expect(h.engine.getProposal(proposal.key)?.isExecuted).toBe(false);

      h.clock.set(unlocksAt);
      const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

      expect(outcome.transfer).toBe("completed");
      expect(h.treasury.balanceOf(dao.key)).toBe(4_000n);
      expect(unlocksAt).toBe(REVEAL_END + EXECUTION_DELAY);
    });

    it("should execute at most once", () => {
      const { dao, proposal, unlocksAt } = passProposal(h);
      h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 5_000n });
      h.clock.set(unlocksAt);

      h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT }))).toBe(
        "ALREADY_EXECUTED"
      );
      expect(h.treasury.getTransfers()).toHaveLength(1);
      expect(h.treasury.getTransfers()[0]).toMatchObject({ recipient: RECIPIENT, amount: 1_000n });
    });

    it("should report a gateway failure and keep the proposal executed", () => {
      const { proposal, unlocksAt } = passProposal(h);
      h.clock.set(unlocksAt);

      const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

      expect(outcome).toMatchObject({
        transfer: "failed",
        reason: "Treasury holds 0 but the transfer needs 1000",
      });
      expect(h.engine.getProposal(proposal.key)?.isExecuted).toBe(true);
      expect(h.engine.events.list("treasury.transfer_failed")).toHaveLength(1);
      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT }))).toBe(
        "ALREADY_EXECUTED"
      );
    });

    it("should reject a target other than the recipient", () => {
      const { dao, proposal, unlocksAt } = passProposal(h);
      h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 5_000n });
      h.clock.set(unlocksAt);

      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: OUTSIDER }))).toBe(
        "TREASURY_RECIPIENT_MISMATCH"
      );
      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key }))).toBe(
        "TREASURY_RECIPIENT_MISMATCH"
      );
      expect(h.engine.getProposal(proposal.key)?.isExecuted).toBe(false);
      expect(h.treasury.balanceOf(dao.key)).toBe(5_000n);
    });

    it("should move tokens from the matching treasury slot", () => {
      const mint = id("ab");
      const { dao, proposal, unlocksAt } = passProposal(h, {
        kind: "send_token",
        amount: 200n,
        recipient: RECIPIENT,
        tokenMint: mint,
      });
      h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 500n, tokenMint: mint });
      h.engine.depositTreasury({ caller: AUTHORITY, dao: dao.key, amount: 50n });
      h.clock.set(unlocksAt);

      const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

      expect(outcome.transfer).toBe("completed");
      expect(h.treasury.balanceOf(dao.key, mint)).toBe(300n);
      expect(h.treasury.balanceOf(dao.key)).toBe(50n);
    });

    it("should release a custom action for relay without moving funds", () => {
      const { proposal, unlocksAt } = passProposal(h, { kind: "custom", amount: 0n, recipient: RECIPIENT });
      h.clock.set(unlocksAt);

      const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key, target: RECIPIENT });

      expect(outcome).toEqual({
        proposal: proposal.key,
        transfer: "relayed",
        action: { kind: "custom", amount: 0n, recipient: RECIPIENT },
      });
      expect(h.treasury.getTransfers()).toHaveLength(0);
      expect(h.engine.events.list("treasury.executed")[0]?.payload).toEqual({
        proposal: proposal.key,
        action: { kind: "custom", amount: 0n, recipient: RECIPIENT },
      });
    });

    it("should mark a proposal without an action executed", () => {
      const dao = createDao(h, { executionDelaySeconds: 0 });
      const proposal = createProposal(h, dao);
      commit(h, proposal, ALICE, true, SALT_A);
      h.clock.set(VOTING_END);
      reveal(h, proposal, ALICE, true, SALT_A);
      h.clock.set(REVEAL_END);
      h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });

      const outcome = h.engine.execute({ caller: OUTSIDER, proposal: proposal.key });

      expect(outcome).toEqual({ proposal: proposal.key, transfer: "none" });
      expect(h.engine.getProposal(proposal.key)?.isExecuted).toBe(true);
    });

    it("should reject executing a failed proposal", () => {
      const dao = createDao(h);
      const proposal = createProposal(h, dao);
      h.clock.set(REVEAL_END);
      h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });

      expect(codeOf(() => h.engine.execute({ caller: OUTSIDER, proposal: proposal.key }))).toBe(
        "PROPOSAL_NOT_PASSED"
      );
    });
  });

  // ============================================
  // TREASURY DEPOSITS
  // ============================================

  describe("depositTreasury", () => {
    it("should accumulate deposits per DAO", () => {
      const dao = createDao(h);

      expect(h.engine.depositTreasury({ caller: ALICE, dao: dao.key, amount: 100n })).toBe(100n);
      expect(h.engine.depositTreasury({ caller: BOB, dao: dao.key, amount: 50n })).toBe(150n);
      expect(h.engine.events.list("treasury.deposit")).toHaveLength(2);
    });

    it("should reject a missing DAO and a zero amount", () => {
      const dao = createDao(h);

      expect(codeOf(() => h.engine.depositTreasury({ caller: ALICE, dao: id("ee"), amount: 100n }))).toBe(
        "DAO_NOT_FOUND"
      );
      expect(codeOf(() => h.engine.depositTreasury({ caller: ALICE, dao: dao.key, amount: 0n }))).toBe(
        "INVALID_AMOUNT"
      );
      expect(h.treasury.balanceOf(dao.key)).toBe(0n);
    });
  });
});
