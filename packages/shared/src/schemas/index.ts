/**
 * SealVote Zod Schemas
 */

export * from "./common.js";
export * from "./env.js";
