/**
 * @sealvote/sdk
 * Voter-side toolkit for commit-reveal ballots
 */

export * from "./client/index.js";
export * from "./commitment/index.js";
export * from "./receipts/index.js";
export * from "./config.js";

// Re-export shared constants for convenience
export { COMMITMENT, REVEAL_INCENTIVE } from "@sealvote/shared";
