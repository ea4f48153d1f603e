/**
 * Treasury Gateway
 *
 * Boundary to whatever moves value out of a DAO treasury. The engine only
 * decides whether a transfer is authorized; the gateway performs it.
 * InMemoryTreasuryGateway is the in-process reference used by tests and the
 * scenario runner.
 */

import * as crypto from "crypto";
import { governanceLogger as logger, type Identity } from "@sealvote/shared";
import { InsufficientTreasuryFundsError } from "../errors/index.js";
import { checkedAddU64 } from "../math/index.js";
import type { TreasuryAction } from "../types.js";

const treasuryLogger = logger.child({ component: "treasury-gateway" });

// ============================================
// TYPES
// ============================================

export type TransferableAction = Extract<TreasuryAction, { kind: "send_native" | "send_token" }>;

export interface TransferRequest {
  dao: string;
  proposal: string;
  action: TransferableAction;
}

export interface TransferReceipt {
  reference: string;
  amount: bigint;
  remainingBalance: bigint;
}

export interface IncentiveEscrowRequest {
  proposal: string;
  from: Identity;
  amount: bigint;
}

export interface TreasuryGateway {
  deposit(dao: string, from: Identity, amount: bigint, tokenMint?: Identity): bigint;
  transfer(request: TransferRequest): TransferReceipt;
  balanceOf(dao: string, tokenMint?: Identity): bigint;
  /** Native funds an account can put up, e.g. for a reveal incentive */
  walletBalance(owner: Identity): bigint;
  /** Moves native funds from an account into a proposal's incentive pool */
  escrowIncentive(request: IncentiveEscrowRequest): string;
}

export interface TransferLogEntry extends TransferReceipt {
  dao: string;
  proposal: string;
  recipient: Identity;
  tokenMint?: Identity;
}

// ============================================
// IN-MEMORY GATEWAY
// ============================================

const NATIVE = "native";

export class InMemoryTreasuryGateway implements TreasuryGateway {
  private readonly balances: Map<string, bigint> = new Map();
  private readonly transfers: TransferLogEntry[] = [];
  private readonly wallets: Map<Identity, bigint> = new Map();
  private readonly escrows: Map<string, bigint> = new Map();

  private slot(dao: string, tokenMint?: Identity): string {
    return `${dao}:${tokenMint ?? NATIVE}`;
  }

  deposit(dao: string, from: Identity, amount: bigint, tokenMint?: Identity): bigint {
    const slot = this.slot(dao, tokenMint);
    const balance = checkedAddU64(this.balances.get(slot) ?? 0n, amount, "treasuryBalance");
    this.balances.set(slot, balance);

    treasuryLogger.debug({ dao, from, asset: tokenMint ?? NATIVE, balance: balance.toString() }, "Deposit recorded");
    return balance;
  }

  transfer(request: TransferRequest): TransferReceipt {
    const { dao, proposal, action } = request;
    const tokenMint = action.kind === "send_token" ? action.tokenMint : undefined;
    const slot = this.slot(dao, tokenMint);
    const available = this.balances.get(slot) ?? 0n;

    if (action.amount > available) {
      throw new InsufficientTreasuryFundsError(
        `Treasury holds ${available} but the transfer needs ${action.amount}`,
        action.amount,
        available
      );
    }

    const remainingBalance = available - action.amount;
    this.balances.set(slot, remainingBalance);

    const receipt: TransferReceipt = {
      reference: `xfer_${crypto.randomUUID()}`,
      amount: action.amount,
      remainingBalance,
    };
    this.transfers.push({
      ...receipt,
      dao,
      proposal,
      recipient: action.recipient,
      ...(tokenMint !== undefined ? { tokenMint } : {}),
    });

    treasuryLogger.info(
      { dao, proposal, reference: receipt.reference, amount: action.amount.toString() },
      "Treasury transfer completed"
    );
    return receipt;
  }

  balanceOf(dao: string, tokenMint?: Identity): bigint {
    return this.balances.get(this.slot(dao, tokenMint)) ?? 0n;
  }

  fundWallet(owner: Identity, amount: bigint): this {
    this.wallets.set(owner, checkedAddU64(this.walletBalance(owner), amount, "walletBalance"));
    return this;
  }

  walletBalance(owner: Identity): bigint {
    return this.wallets.get(owner) ?? 0n;
  }

  escrowIncentive(request: IncentiveEscrowRequest): string {
    const { proposal, from, amount } = request;
    const available = this.walletBalance(from);
    if (amount > available) {
      throw new InsufficientTreasuryFundsError(
        `Account holds ${available} but the incentive needs ${amount}`,
        amount,
        available
      );
    }

    this.wallets.set(from, available - amount);
    this.escrows.set(proposal, checkedAddU64(this.escrowOf(proposal), amount, "incentiveEscrow"));

    const reference = `escrow_${crypto.randomUUID()}`;
    treasuryLogger.debug({ proposal, from, reference, amount: amount.toString() }, "Incentive escrowed");
    return reference;
  }

  escrowOf(proposal: string): bigint {
    return this.escrows.get(proposal) ?? 0n;
  }

  getTransfers(): TransferLogEntry[] {
    return [...this.transfers];
  }
}
