/**
 * Governance Engine
 *
 * The operation surface. Each request:
 *   1. is shape-checked against its zod schema
 *   2. reads the clock once
 *   3. runs inside one store transaction (all effects or none)
 *   4. publishes its staged events only after the commit
 *
 * Rejections propagate unchanged to the caller and are logged at warn.
 */

import type { z } from "zod";
import {
  audit,
  createTimer,
  governanceLogger as logger,
  type AuditLogEntry,
  type Identity,
} from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { resolveGovernanceConfig, type GovernanceConfig } from "../config.js";
import { isGovernanceError, StateError, ValidationError } from "../errors/index.js";
import { EventBuffer, GovernanceEventLog } from "../events/event-log.js";
import { MemoryRecordStore, type RecordStore } from "../store/record-store.js";
import { ConfigRegistry } from "../registry/config-registry.js";
import { ProposalStore } from "../proposals/proposal-store.js";
import { CommitRevealEngine, type RevealResult } from "../voting/commit-reveal-engine.js";
import { DelegationLedger } from "../delegation/delegation-ledger.js";
import { TallyEvaluator, type TallyEvaluation } from "../tally/tally-evaluator.js";
import { TimelockController, type ExecutionOutcome } from "../timelock/timelock-controller.js";
import { InMemoryTreasuryGateway, type TreasuryGateway } from "../treasury/treasury-gateway.js";
import { InMemoryBalanceSource } from "../weight/balance-source.js";
import { VoterWeightService, type SyncedVoterWeight } from "../weight/voter-weight.js";
import { SystemClock } from "./clock.js";
import {
  commitDelegatedVoteRequestSchema,
  commitVoteRequestSchema,
  createConfigRequestSchema,
  createProposalRequestSchema,
  delegateRequestSchema,
  depositTreasuryRequestSchema,
  executeRequestSchema,
  migrateConfigRequestSchema,
  proposalRequestSchema,
  readCommittedWeightRequestSchema,
  revealVoteRequestSchema,
  syncVoterWeightRequestSchema,
  type CommitDelegatedVoteRequest,
  type CommitVoteRequest,
  type CreateConfigRequest,
  type CreateProposalRequest,
  type DelegateRequest,
  type DepositTreasuryRequest,
  type ExecuteRequest,
  type MigrateConfigRequest,
  type ProposalRequest,
  type ReadCommittedWeightRequest,
  type RevealVoteRequest,
  type SyncVoterWeightRequest,
} from "../schemas.js";
import type {
  Clock,
  DaoConfig,
  IncentiveCredit,
  Proposal,
  TokenBalanceSource,
  VoteDelegation,
  VoterRecord,
  VoterWeightRecord,
} from "../types.js";

const engineLogger = logger.child({ component: "engine" });

// ============================================
// OPTIONS
// ============================================

export interface GovernanceEngineOptions {
  store?: RecordStore;
  clock?: Clock;
  balances?: TokenBalanceSource;
  treasury?: TreasuryGateway;
  events?: GovernanceEventLog;
  config?: Partial<GovernanceConfig>;
}

export interface FinalizeResult {
  proposal: Proposal;
  evaluation: TallyEvaluation;
}

// ============================================
// ENGINE
// ============================================

export class GovernanceEngine {
  readonly store: RecordStore;
  readonly events: GovernanceEventLog;
  readonly treasury: TreasuryGateway;
  readonly config: GovernanceConfig;

  private readonly clock: Clock;
  private readonly registry: ConfigRegistry;
  private readonly proposals: ProposalStore;
  private readonly voting: CommitRevealEngine;
  private readonly delegations: DelegationLedger;
  private readonly tally: TallyEvaluator;
  private readonly timelock: TimelockController;
  private readonly voterWeight: VoterWeightService;

  constructor(options: GovernanceEngineOptions = {}) {
    this.config = resolveGovernanceConfig(options.config);
    this.store = options.store ?? new MemoryRecordStore();
    this.events = options.events ?? new GovernanceEventLog();
    this.treasury = options.treasury ?? new InMemoryTreasuryGateway();
    this.clock = options.clock ?? new SystemClock();
    const balances = options.balances ?? new InMemoryBalanceSource();

    this.registry = new ConfigRegistry(this.store);
    this.proposals = new ProposalStore(this.store, this.registry, this.treasury);
    this.voting = new CommitRevealEngine(this.store, this.registry, this.proposals, balances, this.config);
    this.delegations = new DelegationLedger(this.store, this.registry, this.proposals, balances, this.voting);
    this.tally = new TallyEvaluator(this.registry, this.proposals);
    this.timelock = new TimelockController(this.proposals, this.treasury);
    this.voterWeight = new VoterWeightService(
      this.store,
      this.registry,
      this.voting,
      balances,
      this.config.voterWeightExpiryUnits
    );

    engineLogger.debug(
      { revealRebate: this.config.revealRebate.toString(), rebateReserve: this.config.rebateReserve.toString() },
      "Governance engine initialized"
    );
  }

  // ============================================
  // CONFIG REGISTRY
  // ============================================

  createConfig(request: CreateConfigRequest): DaoConfig {
    const { caller, ...params } = this.parse("createConfig", createConfigRequestSchema, request);
    return this.run("createConfig", caller, (ctx) => this.registry.create(ctx, params), (dao) => ({
      action: "dao.created",
      entityType: "dao",
      entityId: dao.key,
      actor: caller,
    }));
  }

  migrateConfig(request: MigrateConfigRequest): DaoConfig {
    const { caller, ...params } = this.parse("migrateConfig", migrateConfigRequestSchema, request);
    return this.run("migrateConfig", caller, (ctx) => this.registry.migrate(ctx, params), (dao) => ({
      action: "dao.migrated",
      entityType: "dao",
      entityId: dao.key,
      actor: caller,
      details: { migratedFrom: params.migratedFrom },
    }));
  }

  // ============================================
  // PROPOSALS
  // ============================================

  createProposal(request: CreateProposalRequest): Proposal {
    const { caller, ...params } = this.parse("createProposal", createProposalRequestSchema, request);
    return this.run("createProposal", caller, (ctx) => this.proposals.create(ctx, params), (proposal) => ({
      action: "proposal.created",
      entityType: "proposal",
      entityId: proposal.key,
      actor: caller,
    }));
  }

  cancelProposal(request: ProposalRequest): Proposal {
    const { caller, proposal } = this.parse("cancelProposal", proposalRequestSchema, request);
    return this.run("cancelProposal", caller, (ctx) => this.proposals.cancel(ctx, proposal), () => ({
      action: "proposal.cancelled",
      entityType: "proposal",
      entityId: proposal,
      actor: caller,
    }));
  }

  vetoProposal(request: ProposalRequest): Proposal {
    const { caller, proposal } = this.parse("vetoProposal", proposalRequestSchema, request);
    return this.run("vetoProposal", caller, (ctx) => this.proposals.veto(ctx, proposal), () => ({
      action: "proposal.vetoed",
      entityType: "proposal",
      entityId: proposal,
      actor: caller,
    }));
  }

  // ============================================
  // VOTING
  // ============================================

  commitVote(request: CommitVoteRequest): VoterRecord {
    const { caller, ...params } = this.parse("commitVote", commitVoteRequestSchema, request);
    return this.run("commitVote", caller, (ctx) => this.voting.commit(ctx, params), () => ({
      action: "vote.committed",
      entityType: "vote",
      entityId: params.proposal,
      actor: caller,
    }));
  }

  delegate(request: DelegateRequest): VoteDelegation {
    const { caller, ...params } = this.parse("delegate", delegateRequestSchema, request);
    return this.run("delegate", caller, (ctx) => this.delegations.delegate(ctx, params), (delegation) => ({
      action: "vote.delegated",
      entityType: "delegation",
      entityId: delegation.key,
      actor: caller,
    }));
  }

  commitDelegatedVote(request: CommitDelegatedVoteRequest): VoterRecord {
    const { caller, ...params } = this.parse("commitDelegatedVote", commitDelegatedVoteRequestSchema, request);
    return this.run("commitDelegatedVote", caller, (ctx) => this.delegations.commitDelegated(ctx, params), () => ({
      action: "vote.committed",
      entityType: "delegation",
      entityId: params.delegation,
      actor: caller,
    }));
  }

  revealVote(request: RevealVoteRequest): RevealResult {
    const { caller, ...params } = this.parse("revealVote", revealVoteRequestSchema, request);
    return this.run("revealVote", caller, (ctx) => this.voting.reveal(ctx, params), (result) => ({
      action: "vote.revealed",
      entityType: "vote",
      entityId: params.proposal,
      actor: caller,
      details: { voter: result.record.voter, incentivePaid: result.incentivePaid.toString() },
    }));
  }

  // ============================================
  // FINALIZE & EXECUTE
  // ============================================

  finalize(request: ProposalRequest): FinalizeResult {
    const { caller, proposal } = this.parse("finalize", proposalRequestSchema, request);
    return this.run("finalize", caller, (ctx) => this.tally.finalize(ctx, proposal), (result) => ({
      action: "proposal.finalized",
      entityType: "proposal",
      entityId: proposal,
      actor: caller,
      details: { status: result.proposal.status, quorumMet: result.evaluation.quorumMet },
    }));
  }

  /**
   * Marks the proposal executed in its own transaction, then hands the
   * action to the treasury gateway.
   */
  execute(request: ExecuteRequest): ExecutionOutcome {
    const { caller, proposal, target } = this.parse("execute", executeRequestSchema, request);
    const done = createTimer("execute", engineLogger);
    const ctx = this.context("execute", caller);
    const authorized = this.transact("execute", ctx, () => this.timelock.authorize(ctx, proposal, target));

    const outcome = this.timelock.handOff(ctx, authorized);
    this.publish(ctx);
    audit({
      action: "proposal.executed",
      entityType: "treasury",
      entityId: proposal,
      actor: caller,
      details: { transfer: outcome.transfer },
    });
    done();
    return outcome;
  }

  // ============================================
  // TREASURY
  // ============================================

  depositTreasury(request: DepositTreasuryRequest): bigint {
    const { caller, dao, amount, tokenMint } = this.parse("depositTreasury", depositTreasuryRequestSchema, request);
    return this.run(
      "depositTreasury",
      caller,
      (ctx) => {
        this.registry.get(dao);
        if (amount === 0n) {
          throw new ValidationError("INVALID_AMOUNT", "Deposit amount must be positive");
        }
        const balance = this.treasury.deposit(dao, caller, amount, tokenMint);
        ctx.events.stage({
          type: "treasury.deposit",
          payload: { dao, from: caller, amount, ...(tokenMint !== undefined ? { tokenMint } : {}) },
        });
        return balance;
      },
      (balance) => ({
        action: "treasury.deposit",
        entityType: "treasury",
        entityId: dao,
        actor: caller,
        details: { amount: amount.toString(), balance: balance.toString() },
      })
    );
  }

  // ============================================
  // EXTERNAL VOTER WEIGHT
  // ============================================

  syncExternalVotingWeight(request: SyncVoterWeightRequest): SyncedVoterWeight {
    const { caller, ...params } = this.parse("syncExternalVotingWeight", syncVoterWeightRequestSchema, request);
    return this.run("syncExternalVotingWeight", caller, (ctx) => this.voterWeight.sync(ctx, params), (synced) => ({
      action: "voter_weight.synced",
      entityType: "voter_weight",
      entityId: synced.key,
      actor: caller,
    }));
  }

  readCommittedWeight(request: ReadCommittedWeightRequest): bigint {
    const { proposal, voter } = this.parse("readCommittedWeight", readCommittedWeightRequestSchema, request);
    return this.voterWeight.readCommittedWeight(proposal, voter);
  }

  // ============================================
  // READS
  // ============================================

  getDao(key: string): DaoConfig | undefined {
    return this.registry.find(key);
  }

  getProposal(key: string): Proposal | undefined {
    return this.proposals.find(key);
  }

  getVoterRecord(proposal: string, voter: Identity): VoterRecord | undefined {
    return this.voting.findVoterRecord(proposal, voter);
  }

  getDelegation(key: string): VoteDelegation | undefined {
    return this.delegations.find(key);
  }

  getVoterWeightRecord(realm: Identity, mint: Identity, owner: Identity): VoterWeightRecord | undefined {
    return this.voterWeight.find(realm, mint, owner);
  }

  readIncentiveCredit(owner: Identity): IncentiveCredit {
    return this.voting.readIncentiveCredit(owner);
  }

  // ============================================
  // REQUEST PLUMBING
  // ============================================

  private parse<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, request: unknown): T {
    const result = schema.safeParse(request);
    if (!result.success) {
      const error = new ValidationError("INVALID_REQUEST", `Malformed ${operation} request`, {
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      this.reject(operation, error);
      throw error;
    }
    return result.data;
  }

  private context(operation: string, caller: Identity): RequestContext {
    const now = this.clock.now();
    if (!Number.isSafeInteger(now)) {
      const error = new StateError("INVALID_CLOCK", "Clock returned a non-integer timestamp", { now });
      this.reject(operation, error);
      throw error;
    }
    return { caller, now, events: new EventBuffer() };
  }

  private transact<T>(operation: string, ctx: RequestContext, fn: () => T): T {
    try {
      return this.store.transaction(fn);
    } catch (error) {
      ctx.events.drain();
      this.reject(operation, error);
      throw error;
    }
  }

  private publish(ctx: RequestContext): void {
    this.events.publish(ctx.events.drain(), ctx.now);
  }

  private run<T>(
    operation: string,
    caller: Identity,
    fn: (ctx: RequestContext) => T,
    describe: (result: T) => AuditLogEntry
  ): T {
    const done = createTimer(operation, engineLogger);
    const ctx = this.context(operation, caller);
    const result = this.transact(operation, ctx, () => fn(ctx));
    this.publish(ctx);
    audit(describe(result));
    done();
    return result;
  }

  private reject(operation: string, error: unknown): void {
    if (isGovernanceError(error)) {
      engineLogger.warn({ operation, code: error.code, category: error.category }, "Request rejected");
    } else {
      engineLogger.error({ operation, err: error }, "Request failed");
    }
  }
}

export function createGovernanceEngine(options: GovernanceEngineOptions = {}): GovernanceEngine {
  return new GovernanceEngine(options);
}
