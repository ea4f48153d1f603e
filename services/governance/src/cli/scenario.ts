/**
 * Scenario Replay
 *
 * A scenario names its participants, seeds token and wallet balances, and lists timed
 * steps. The steps replay in order against a fresh in-memory engine driven
 * by a manual clock. Steps may declare the error code they expect, so a scenario can
 * show rejected requests alongside the happy path.
 */

import { z } from "zod";
import {
  bytes32Schema,
  identitySchema,
  secondsSchema,
  treasuryActionKindSchema,
  u64Schema,
  TIMELOCK,
  type Identity,
  type ProposalStatus,
} from "@sealvote/shared";
import { computeCommitment } from "../commitment/index.js";
import { recordKeys } from "../codec/records.js";
import { isGovernanceError } from "../errors/index.js";
import type { GovernanceEvent } from "../events/event-log.js";
import { votingConfigSchema } from "../schemas.js";
import { InMemoryTreasuryGateway } from "../treasury/treasury-gateway.js";
import { InMemoryBalanceSource } from "../weight/balance-source.js";
import { ManualClock } from "../engine/clock.js";
import { GovernanceEngine } from "../engine/governance-engine.js";
import type { GovernanceConfig } from "../config.js";

// ============================================
// SCENARIO SCHEMA
// ============================================

const alias = z.string().min(1);

const stepBase = z.object({
  at: secondsSchema.nonnegative(),
  as: alias,
  expectError: z.string().optional(),
});

const stepSchema = z.discriminatedUnion("op", [
  stepBase.extend({
    op: z.literal("createConfig"),
    label: alias,
    name: z.string(),
    quorumPercentage: z.number().int(),
    requiredBalance: u64Schema.default(0n),
    revealWindowSeconds: secondsSchema,
    executionDelaySeconds: secondsSchema.default(TIMELOCK.defaultExecutionDelaySeconds),
    votingConfig: votingConfigSchema,
  }),
  stepBase.extend({
    op: z.literal("depositTreasury"),
    dao: alias,
    amount: u64Schema,
  }),
  stepBase.extend({
    op: z.literal("createProposal"),
    dao: alias,
    label: alias,
    title: z.string(),
    description: z.string().default(""),
    votingDurationSeconds: secondsSchema,
    treasuryAction: z
      .object({
        kind: treasuryActionKindSchema,
        amount: u64Schema,
        recipient: alias,
        tokenMint: identitySchema.optional(),
      })
      .optional(),
    incentiveDeposit: u64Schema.default(0n),
  }),
  stepBase.extend({ op: z.literal("delegate"), proposal: alias, delegatee: alias }),
  stepBase.extend({
    op: z.literal("commitVote"),
    proposal: alias,
    vote: z.boolean(),
    salt: bytes32Schema,
    keeper: alias.optional(),
  }),
  stepBase.extend({
    op: z.literal("commitDelegatedVote"),
    proposal: alias,
    delegator: alias,
    vote: z.boolean(),
    salt: bytes32Schema,
    keeper: alias.optional(),
  }),
  stepBase.extend({
    op: z.literal("revealVote"),
    proposal: alias,
    voter: alias,
    vote: z.boolean(),
    salt: bytes32Schema,
  }),
  stepBase.extend({ op: z.literal("cancelProposal"), proposal: alias }),
  stepBase.extend({ op: z.literal("vetoProposal"), proposal: alias }),
  stepBase.extend({ op: z.literal("finalize"), proposal: alias }),
  stepBase.extend({ op: z.literal("execute"), proposal: alias, target: alias.optional() }),
  stepBase.extend({ op: z.literal("syncVoterWeight"), dao: alias, realm: identitySchema }),
]);

export const scenarioSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  startTime: secondsSchema.nonnegative(),
  governanceToken: identitySchema,
  identities: z.record(alias, identitySchema),
  balances: z.array(z.object({ owner: alias, amount: u64Schema })).default([]),
  // Native funds for incentive deposits
  wallets: z.array(z.object({ owner: alias, amount: u64Schema })).default([]),
  steps: z.array(stepSchema).min(1),
});

export type Scenario = z.output<typeof scenarioSchema>;
export type ScenarioStep = Scenario["steps"][number];

// ============================================
// REPORT
// ============================================

export interface StepReport {
  index: number;
  op: ScenarioStep["op"];
  as: string;
  at: number;
  ok: boolean;
  code?: string;
  expected: boolean;
}

export interface ProposalReport {
  label: string;
  key: string;
  status: ProposalStatus;
  yesCapital: bigint;
  noCapital: bigint;
  yesCommunity: bigint;
  noCommunity: bigint;
  commitCount: bigint;
  revealCount: bigint;
  executionUnlocksAt: number;
  isExecuted: boolean;
}

export interface ScenarioReport {
  name: string;
  steps: StepReport[];
  proposals: ProposalReport[];
  treasury: Array<{ label: string; balance: bigint }>;
  incentives: Array<{ alias: string; amount: bigint }>;
  events: GovernanceEvent[];
  // Steps whose outcome differed from what the scenario declared
  unexpected: StepReport[];
}

export class ScenarioError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScenarioError";
  }
}

// ============================================
// REPLAY
// ============================================

export function parseScenario(input: unknown): Scenario {
  const result = scenarioSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ScenarioError(`Invalid scenario: ${issues.join("; ")}`);
  }
  return result.data;
}

export function runScenario(scenario: Scenario, config: Partial<GovernanceConfig> = {}): ScenarioReport {
  const clock = new ManualClock(scenario.startTime);
  const balances = new InMemoryBalanceSource();
  const treasury = new InMemoryTreasuryGateway();
  const engine = new GovernanceEngine({ clock, balances, treasury, config });

  const daos = new Map<string, string>();
  const proposals = new Map<string, string>();

  const identity = (name: string): Identity => {
    const value = scenario.identities[name];
    if (value === undefined) {
      throw new ScenarioError(`Unknown identity alias "${name}"`);
    }
    return value;
  };
  const lookup = (labels: Map<string, string>, kind: string, label: string): string => {
    const key = labels.get(label);
    if (key === undefined) {
      throw new ScenarioError(`Unknown ${kind} label "${label}"`);
    }
    return key;
  };
  const optionalIdentity = (name: string | undefined): { keeper?: Identity } =>
    name !== undefined ? { keeper: identity(name) } : {};

  for (const { owner, amount } of scenario.balances) {
    balances.setBalance(identity(owner), scenario.governanceToken, amount);
  }
  for (const { owner, amount } of scenario.wallets) {
    treasury.fundWallet(identity(owner), amount);
  }

  const apply = (step: ScenarioStep, caller: Identity): void => {
    switch (step.op) {
      case "createConfig": {
        const dao = engine.createConfig({
          caller,
          name: step.name,
          governanceToken: scenario.governanceToken,
          quorumPercentage: step.quorumPercentage,
          requiredBalance: step.requiredBalance,
          revealWindowSeconds: step.revealWindowSeconds,
          executionDelaySeconds: step.executionDelaySeconds,
          votingConfig: step.votingConfig,
        });
        daos.set(step.label, dao.key);
        return;
      }
      case "depositTreasury":
        engine.depositTreasury({ caller, dao: lookup(daos, "DAO", step.dao), amount: step.amount });
        return;
      case "createProposal": {
        const action = step.treasuryAction;
        const proposal = engine.createProposal({
          caller,
          dao: lookup(daos, "DAO", step.dao),
          title: step.title,
          description: step.description,
          votingDurationSeconds: step.votingDurationSeconds,
          incentiveDeposit: step.incentiveDeposit,
          ...(action !== undefined
            ? {
                treasuryAction: {
                  kind: action.kind,
                  amount: action.amount,
                  recipient: identity(action.recipient),
                  ...(action.tokenMint !== undefined ? { tokenMint: action.tokenMint } : {}),
                },
              }
            : {}),
        });
        proposals.set(step.label, proposal.key);
        return;
      }
      case "delegate":
        engine.delegate({
          caller,
          proposal: lookup(proposals, "proposal", step.proposal),
          delegatee: identity(step.delegatee),
        });
        return;
      case "commitVote":
        engine.commitVote({
          caller,
          proposal: lookup(proposals, "proposal", step.proposal),
          commitment: computeCommitment(step.vote, step.salt, caller),
          ...optionalIdentity(step.keeper),
        });
        return;
      case "commitDelegatedVote": {
        const proposal = lookup(proposals, "proposal", step.proposal);
        engine.commitDelegatedVote({
          caller,
          proposal,
          delegation: recordKeys.delegation(proposal, identity(step.delegator)),
          commitment: computeCommitment(step.vote, step.salt, caller),
          ...optionalIdentity(step.keeper),
        });
        return;
      }
      case "revealVote":
        engine.revealVote({
          caller,
          proposal: lookup(proposals, "proposal", step.proposal),
          voter: identity(step.voter),
          vote: step.vote,
          salt: step.salt,
        });
        return;
      case "cancelProposal":
        engine.cancelProposal({ caller, proposal: lookup(proposals, "proposal", step.proposal) });
        return;
      case "vetoProposal":
        engine.vetoProposal({ caller, proposal: lookup(proposals, "proposal", step.proposal) });
        return;
      case "finalize":
        engine.finalize({ caller, proposal: lookup(proposals, "proposal", step.proposal) });
        return;
      case "execute": {
        const outcome = engine.execute({
          caller,
          proposal: lookup(proposals, "proposal", step.proposal),
          ...(step.target !== undefined ? { target: identity(step.target) } : {}),
        });
        if (outcome.transfer === "failed") {
          throw new ScenarioError(`Treasury transfer failed: ${outcome.reason}`);
        }
        return;
      }
      case "syncVoterWeight":
        engine.syncExternalVotingWeight({
          caller,
          dao: lookup(daos, "DAO", step.dao),
          realm: step.realm,
          governingTokenMint: scenario.governanceToken,
        });
        return;
    }
  };

  const steps: StepReport[] = [];
  scenario.steps.forEach((step, index) => {
    clock.set(scenario.startTime + step.at);
    const base = { index, op: step.op, as: step.as, at: step.at };
    try {
      apply(step, identity(step.as));
      steps.push({ ...base, ok: true, expected: step.expectError === undefined });
    } catch (error) {
      if (!isGovernanceError(error)) {
        throw error;
      }
      steps.push({ ...base, ok: false, code: error.code, expected: step.expectError === error.code });
    }
  });

  const proposalReports: ProposalReport[] = [];
  for (const [label, key] of proposals) {
    const p = engine.getProposal(key);
    if (p === undefined) continue;
    proposalReports.push({
      label,
      key,
      status: p.status,
      yesCapital: p.yesCapital,
      noCapital: p.noCapital,
      yesCommunity: p.yesCommunity,
      noCommunity: p.noCommunity,
      commitCount: p.commitCount,
      revealCount: p.revealCount,
      executionUnlocksAt: p.executionUnlocksAt,
      isExecuted: p.isExecuted,
    });
  }

  return {
    name: scenario.name,
    steps,
    proposals: proposalReports,
    treasury: [...daos].map(([label, key]) => ({ label, balance: treasury.balanceOf(key) })),
    incentives: Object.entries(scenario.identities)
      .map(([name, id]) => ({ alias: name, amount: engine.readIncentiveCredit(id).amount }))
      .filter((entry) => entry.amount > 0n),
    events: engine.events.list(),
    unexpected: steps.filter((step) => !step.expected),
  };
}
