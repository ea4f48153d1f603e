/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { U64_MAX } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** 32-byte identity (account, token mint, realm) as 0x-prefixed hex */
export const identitySchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, "Identity must be 32 bytes of 0x-prefixed hex")
  .transform((value) => value.toLowerCase());

export type Identity = string;

/** 32-byte commitment digest or salt */
export const bytes32Schema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, "Expected 32 bytes of 0x-prefixed hex")
  .transform((value) => value.toLowerCase());

export type Hex32 = string;

/**
 * Unsigned 64-bit amount. Accepts bigint, decimal strings and safe integers
 * so that JSON fixtures can carry large balances.
 */
export const u64Schema = z
  .union([
    z.bigint(),
    z.string().regex(/^\d+$/, "Amount must be a decimal string").transform((val) => BigInt(val)),
    z.number().int().nonnegative().transform((val) => BigInt(val)),
  ])
  .refine((val) => val >= 0n && val <= U64_MAX, "Amount must fit in an unsigned 64-bit integer");

/** Whole seconds */
export const secondsSchema = z.number().int().safe();

// ============================================
// GOVERNANCE ENUMS
// ============================================

export const proposalStatusSchema = z.enum([
  "voting",
  "passed",
  "failed",
  "cancelled",
  "vetoed",
]);
export type ProposalStatus = z.infer<typeof proposalStatusSchema>;

export const treasuryActionKindSchema = z.enum(["send_native", "send_token", "custom"]);
export type TreasuryActionKind = z.infer<typeof treasuryActionKindSchema>;
