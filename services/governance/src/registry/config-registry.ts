/**
 * Config Registry
 *
 * One immutable configuration per (authority, name). The only mutation after
 * creation is the proposal counter; a migrated DAO is a new config.
 */

import { governanceLogger as logger, LIMITS, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { DuplicateError, StateError, ValidationError } from "../errors/index.js";
import { checkedAddU64 } from "../math/index.js";
import { daoCodec, recordKeys } from "../codec/records.js";
import { readRecord, writeRecord, type RecordStore } from "../store/record-store.js";
import type { DaoConfig, VotingConfig } from "../types.js";

const registryLogger = logger.child({ component: "config-registry" });

export interface ConfigParams {
  name: string;
  governanceToken: Identity;
  quorumPercentage: number;
  requiredBalance: bigint;
  revealWindowSeconds: number;
  executionDelaySeconds: number;
  votingConfig: VotingConfig;
}

export interface MigrateParams extends Omit<ConfigParams, "requiredBalance"> {
  migratedFrom: Identity;
}

// ============================================
// VALIDATION
// ============================================

function isPercentage(value: number): boolean {
  return Number.isInteger(value) && value >= LIMITS.minPercentage && value <= LIMITS.maxPercentage;
}

export function validateConfigParams(params: ConfigParams): void {
  if (Buffer.byteLength(params.name, "utf8") > LIMITS.maxDaoNameLength) {
    throw new ValidationError("NAME_TOO_LONG", `DAO name exceeds ${LIMITS.maxDaoNameLength} bytes`);
  }
  if (!isPercentage(params.quorumPercentage)) {
    throw new ValidationError("INVALID_QUORUM", "Quorum percentage must be between 1 and 100", {
      quorumPercentage: params.quorumPercentage,
    });
  }
  if (params.revealWindowSeconds < LIMITS.minRevealWindowSeconds) {
    throw new ValidationError(
      "REVEAL_WINDOW_TOO_SHORT",
      `Reveal window must be at least ${LIMITS.minRevealWindowSeconds} seconds`,
      { revealWindowSeconds: params.revealWindowSeconds }
    );
  }
  if (params.executionDelaySeconds < 0) {
    throw new ValidationError("INVALID_EXECUTION_DELAY", "Execution delay cannot be negative", {
      executionDelaySeconds: params.executionDelaySeconds,
    });
  }
  if (params.votingConfig.kind === "dual_chamber") {
    const { capitalThreshold, communityThreshold } = params.votingConfig;
    if (!isPercentage(capitalThreshold) || !isPercentage(communityThreshold)) {
      throw new ValidationError("INVALID_THRESHOLD", "Chamber thresholds must be between 1 and 100", {
        capitalThreshold,
        communityThreshold,
      });
    }
  }
}

// ============================================
// REGISTRY
// ============================================

export class ConfigRegistry {
  constructor(private readonly store: RecordStore) {}

  create(ctx: RequestContext, params: ConfigParams): DaoConfig {
    validateConfigParams(params);
    const dao = this.insert(ctx.caller, params);

    ctx.events.stage({
      type: "dao.created",
      payload: { dao: dao.key, name: dao.name, authority: dao.authority, votingConfig: dao.votingConfig },
    });
    registryLogger.info({ dao: dao.key, name: dao.name, mode: dao.votingConfig.kind }, "DAO created");
    return dao;
  }

  /**
   * Re-creates a DAO from an external governance instance. Identical to
   * create() except that voting is unrestricted and provenance is recorded.
   */
  migrate(ctx: RequestContext, params: MigrateParams): DaoConfig {
    const { migratedFrom, ...rest } = params;
    const configParams: ConfigParams = { ...rest, requiredBalance: 0n };
    validateConfigParams(configParams);
    const dao = this.insert(ctx.caller, configParams, migratedFrom);

    ctx.events.stage({
      type: "dao.migrated",
      payload: { dao: dao.key, name: dao.name, migratedFrom, governanceToken: dao.governanceToken },
    });
    registryLogger.info({ dao: dao.key, migratedFrom }, "DAO migrated");
    return dao;
  }

  find(key: string): DaoConfig | undefined {
    return readRecord(this.store, daoCodec, key);
  }

  get(key: string): DaoConfig {
    const dao = this.find(key);
    if (!dao) {
      throw new StateError("DAO_NOT_FOUND", "DAO config not found", { dao: key });
    }
    return dao;
  }

  /**
   * Reserves the next proposal id and bumps the counter.
   */
  nextProposalId(dao: DaoConfig): bigint {
    const id = dao.proposalCount;
    writeRecord(this.store, daoCodec, dao.key, {
      ...dao,
      proposalCount: checkedAddU64(dao.proposalCount, 1n, "proposalCount"),
    });
    return id;
  }

  private insert(authority: Identity, params: ConfigParams, migratedFrom?: Identity): DaoConfig {
    const key = recordKeys.dao(authority, params.name);
    if (this.store.has(key)) {
      throw new DuplicateError("DAO_ALREADY_EXISTS", "A DAO with this name already exists for the authority", {
        dao: key,
      });
    }

    const dao: DaoConfig = {
      key,
      authority,
      ...params,
      proposalCount: 0n,
      ...(migratedFrom !== undefined ? { migratedFrom } : {}),
    };
    writeRecord(this.store, daoCodec, key, dao);
    return dao;
  }
}
