/**
 * Environment Schema
 */

import { z } from "zod";

export const envSchema = z.object({
  // Reveal incentive (smallest native unit)
  REVEAL_REBATE: z.string().regex(/^\d+$/).transform((v) => BigInt(v)).default("1000000"),
  REVEAL_REBATE_RESERVE: z.string().regex(/^\d+$/).transform((v) => BigInt(v)).default("1500000"),

  // External voter weight record
  VOTER_WEIGHT_EXPIRY_UNITS: z.string().transform(Number).default("100"),

  // SDK receipts
  RECEIPT_DIR: z.string().default("./data/receipts"),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
