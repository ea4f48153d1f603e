/**
 * SDK Configuration
 */

import { envSchema } from "@sealvote/shared";

export interface SealVoteSDKConfig {
  /** Directory that holds vote receipts (salts) until reveal */
  receiptDir?: string;
}

export const DEFAULT_CONFIG: Required<SealVoteSDKConfig> = {
  receiptDir: "./data/receipts",
};

/**
 * Explicit options win over RECEIPT_DIR from the environment.
 */
export function createConfig(
  config: SealVoteSDKConfig = {},
  env: Record<string, string | undefined> = process.env
): Required<SealVoteSDKConfig> {
  const { RECEIPT_DIR } = envSchema.parse(env);
  return {
    ...DEFAULT_CONFIG,
    receiptDir: config.receiptDir ?? RECEIPT_DIR,
  };
}
