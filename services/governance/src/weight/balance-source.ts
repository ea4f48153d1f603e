import type { Identity } from "@sealvote/shared";
import { assertU64 } from "../math/index.js";
import type { TokenBalanceSource } from "../types.js";

/**
 * Token balances held in process. Stands in for the external token ledger
 * in tests and the scenario runner.
 */
export class InMemoryBalanceSource implements TokenBalanceSource {
  private readonly balances: Map<string, bigint> = new Map();

  private slot(owner: Identity, mint: Identity): string {
    return `${mint}:${owner}`;
  }

  setBalance(owner: Identity, mint: Identity, amount: bigint): this {
    this.balances.set(this.slot(owner, mint), assertU64(amount, "balance"));
    return this;
  }

  balanceOf(owner: Identity, mint: Identity): bigint {
    return this.balances.get(this.slot(owner, mint)) ?? 0n;
  }
}
