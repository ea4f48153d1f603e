/**
 * Shared fixtures for governance tests
 */

import { computeCommitment } from "../commitment/index.js";
import { isGovernanceError } from "../errors/index.js";
import { ManualClock } from "../engine/clock.js";
import { GovernanceEngine } from "../engine/governance-engine.js";
import { InMemoryTreasuryGateway } from "../treasury/treasury-gateway.js";
import { InMemoryBalanceSource } from "../weight/balance-source.js";
import type { GovernanceConfig } from "../config.js";
import type { CreateConfigRequest, CreateProposalRequest } from "../schemas.js";
import type { DaoConfig, Proposal } from "../types.js";

/** 32-byte placeholder identity made of one repeated byte */
export const id = (byte: string): string => `0x${byte.repeat(32)}`;

export const TOKEN = id("77");
export const AUTHORITY = id("11");
export const ALICE = id("22");
export const BOB = id("33");
export const CAROL = id("44");
export const DAVE = id("55");
export const KEEPER = id("66");
export const RECIPIENT = id("88");
export const OUTSIDER = id("99");

export const SALT_A = id("a1");
export const SALT_B = id("b2");
export const SALT_C = id("c3");

export const START = 1_700_000_000;
export const VOTING_DURATION = 600;
export const REVEAL_WINDOW = 3600;
export const EXECUTION_DELAY = 86_400;

export const VOTING_END = START + VOTING_DURATION;
export const REVEAL_END = VOTING_END + REVEAL_WINDOW;

// Balances chosen so every quadratic weight is exact
export const BALANCES: Record<string, bigint> = {
  [ALICE]: 1_000_000n, // isqrt 1000
  [BOB]: 250_000n, // isqrt 500
  [CAROL]: 40_000n, // isqrt 200
  [DAVE]: 10_000n, // isqrt 100
};

// Native funds Alice can put up as incentive deposits
export const WALLET = 10_000_000n;

export interface Harness {
  clock: ManualClock;
  balances: InMemoryBalanceSource;
  treasury: InMemoryTreasuryGateway;
  engine: GovernanceEngine;
}

export function createHarness(config: Partial<GovernanceConfig> = {}): Harness {
  const clock = new ManualClock(START);
  const balances = new InMemoryBalanceSource();
  for (const [owner, amount] of Object.entries(BALANCES)) {
    balances.setBalance(owner, TOKEN, amount);
  }
  const treasury = new InMemoryTreasuryGateway().fundWallet(ALICE, WALLET);
  const engine = new GovernanceEngine({ clock, balances, treasury, config });
  return { clock, balances, treasury, engine };
}

export function createDao(h: Harness, overrides: Partial<CreateConfigRequest> = {}): DaoConfig {
  return h.engine.createConfig({
    caller: AUTHORITY,
    name: "test-dao",
    governanceToken: TOKEN,
    quorumPercentage: 50,
    requiredBalance: 0n,
    revealWindowSeconds: REVEAL_WINDOW,
    executionDelaySeconds: EXECUTION_DELAY,
    votingConfig: { kind: "token_weighted" },
    ...overrides,
  });
}

export function createProposal(
  h: Harness,
  dao: DaoConfig,
  overrides: Partial<CreateProposalRequest> = {}
): Proposal {
  return h.engine.createProposal({
    caller: ALICE,
    dao: dao.key,
    title: "Test proposal",
    description: "A proposal used in tests",
    votingDurationSeconds: VOTING_DURATION,
    ...overrides,
  });
}

export function commit(h: Harness, proposal: Proposal, voter: string, vote: boolean, salt: string, keeper?: string) {
  return h.engine.commitVote({
    caller: voter,
    proposal: proposal.key,
    commitment: computeCommitment(vote, salt, voter),
    ...(keeper !== undefined ? { keeper } : {}),
  });
}

export function reveal(h: Harness, proposal: Proposal, voter: string, vote: boolean, salt: string, caller = voter) {
  return h.engine.revealVote({ caller, proposal: proposal.key, voter, vote, salt });
}

/**
 * Runs a token-weighted proposal with a send_native action to a passing
 * finalize at REVEAL_END. Alice votes yes, Bob votes no.
 */
export function passProposal(
  h: Harness,
  action: CreateProposalRequest["treasuryAction"] = { kind: "send_native", amount: 1_000n, recipient: RECIPIENT }
) {
  const dao = createDao(h);
  const proposal = createProposal(h, dao, { treasuryAction: action });
  commit(h, proposal, ALICE, true, SALT_A);
  commit(h, proposal, BOB, false, SALT_B);
  h.clock.set(VOTING_END);
  reveal(h, proposal, ALICE, true, SALT_A);
  reveal(h, proposal, BOB, false, SALT_B);
  h.clock.set(REVEAL_END);
  const { proposal: finalized } = h.engine.finalize({ caller: OUTSIDER, proposal: proposal.key });
  return { dao, proposal: finalized, unlocksAt: REVEAL_END + EXECUTION_DELAY };
}

/**
 * Runs fn and returns the code of the governance error it raised, or
 * undefined when it succeeded.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (isGovernanceError(error)) return error.code;
    throw error;
  }
  return undefined;
}
