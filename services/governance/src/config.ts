/**
 * Governance Service Configuration
 */

import { z } from "zod";
import { envSchema, REVEAL_INCENTIVE, VOTER_WEIGHT } from "@sealvote/shared";

// ============================================
// GOVERNANCE CONFIG SCHEMA
// ============================================

const governanceConfigSchema = z.object({
  // Reveal incentive
  revealRebate: z.bigint().nonnegative(),
  rebateReserve: z.bigint().nonnegative(),

  // External voter weight record
  voterWeightExpiryUnits: z.number().int().nonnegative().safe(),
});

export type GovernanceConfig = z.infer<typeof governanceConfigSchema>;

export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  revealRebate: REVEAL_INCENTIVE.defaultRebate,
  rebateReserve: REVEAL_INCENTIVE.defaultReserve,
  voterWeightExpiryUnits: VOTER_WEIGHT.defaultExpiryUnits,
};

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadGovernanceConfig(
  env: Record<string, string | undefined> = process.env
): GovernanceConfig {
  const parsed = envSchema.parse(env);

  const config: GovernanceConfig = {
    revealRebate: parsed.REVEAL_REBATE,
    rebateReserve: parsed.REVEAL_REBATE_RESERVE,
    voterWeightExpiryUnits: parsed.VOTER_WEIGHT_EXPIRY_UNITS,
  };

  return governanceConfigSchema.parse(config);
}

/**
 * Merges overrides over the defaults and validates the result.
 */
export function resolveGovernanceConfig(overrides: Partial<GovernanceConfig> = {}): GovernanceConfig {
  return governanceConfigSchema.parse({ ...DEFAULT_GOVERNANCE_CONFIG, ...overrides });
}
