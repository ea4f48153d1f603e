/**
 * External Voter Weight
 *
 * Publishes a voter's weight in the fixed VoterWeightRecord layout so that an
 * external governance platform can read it without knowing this engine.
 * The record expires a fixed number of time units after each sync.
 */

import { governanceLogger as logger, type Identity } from "@sealvote/shared";
import type { RequestContext } from "../context.js";
import { ValidationError } from "../errors/index.js";
import { isqrt } from "../math/index.js";
import { recordKeys, voterWeightRecordCodec } from "../codec/records.js";
import { readRecord, type RecordStore } from "../store/record-store.js";
import type { ConfigRegistry } from "../registry/config-registry.js";
import type { CommitRevealEngine } from "../voting/commit-reveal-engine.js";
import type { TokenBalanceSource, VoterWeightRecord } from "../types.js";

const weightLogger = logger.child({ component: "voter-weight" });

const RESERVED_BYTES = 8;

export interface SyncVoterWeightParams {
  dao: string;
  realm: Identity;
  governingTokenMint: Identity;
}

export interface SyncedVoterWeight {
  key: string;
  record: VoterWeightRecord;
  bytes: Uint8Array;
}

export class VoterWeightService {
  constructor(
    private readonly store: RecordStore,
    private readonly registry: ConfigRegistry,
    private readonly voting: CommitRevealEngine,
    private readonly balances: TokenBalanceSource,
    private readonly expiryUnits: number
  ) {}

  /**
   * Recomputes the caller's weight from the current balance and upserts
   * their record.
   */
  sync(ctx: RequestContext, params: SyncVoterWeightParams): SyncedVoterWeight {
    const dao = this.registry.get(params.dao);
    if (params.governingTokenMint !== dao.governanceToken) {
      throw new ValidationError("GOVERNING_MINT_MISMATCH", "Governing token does not match the DAO", {
        dao: dao.key,
      });
    }

    const raw = this.balances.balanceOf(ctx.caller, dao.governanceToken);
    const voterWeight = dao.votingConfig.kind === "token_weighted" ? raw : isqrt(raw);
    const voterWeightExpiry = BigInt(ctx.now) + BigInt(this.expiryUnits);
    if (voterWeightExpiry < 0n) {
      throw new ValidationError("INVALID_CLOCK", "Clock reading precedes the expiry range");
    }

    const record: VoterWeightRecord = {
      realm: params.realm,
      governingTokenMint: params.governingTokenMint,
      governingTokenOwner: ctx.caller,
      voterWeight,
      voterWeightExpiry,
      reserved: new Uint8Array(RESERVED_BYTES),
    };

    const key = recordKeys.voterWeight(params.realm, params.governingTokenMint, ctx.caller);
    const bytes = voterWeightRecordCodec.encode(record);
    this.store.putBytes(key, bytes);

    ctx.events.stage({
      type: "voter_weight.synced",
      payload: { realm: params.realm, owner: ctx.caller, weight: voterWeight, expiry: voterWeightExpiry },
    });
    weightLogger.debug({ realm: params.realm, owner: ctx.caller }, "Voter weight synced");

    return { key, record, bytes: Uint8Array.from(bytes) };
  }

  find(realm: Identity, mint: Identity, owner: Identity): VoterWeightRecord | undefined {
    return readRecord(this.store, voterWeightRecordCodec, recordKeys.voterWeight(realm, mint, owner));
  }

  /**
   * The community weight snapshotted at commit, or 0 when the voter has not
   * committed on the proposal.
   */
  readCommittedWeight(proposal: string, voter: Identity): bigint {
    const record = this.voting.findVoterRecord(proposal, voter);
    return record?.hasCommitted === true ? record.communityWeight : 0n;
  }
}
