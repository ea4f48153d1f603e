/**
 * Voter-side commitment helpers
 *
 * Builds the same 32-byte digest the engine checks at reveal time:
 * sha256(vote_byte ‖ salt ‖ voter).
 */

import { randomBytes } from "crypto";
import { bytesToHex, concat, isHex, sha256, size, type Hex } from "viem";
import { COMMITMENT } from "@sealvote/shared";

export class CommitmentInputError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = "CommitmentInputError";
  }
}

function assertBytes32(value: string, field: string): Hex {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new CommitmentInputError(field, `${field} must be 32 bytes of 0x-prefixed hex`);
  }
  return value;
}

/**
 * Fresh 32-byte salt. Lose it and the vote can never be revealed.
 */
export function generateSalt(): Hex {
  return bytesToHex(randomBytes(COMMITMENT.saltBytes));
}

export function buildCommitment(vote: boolean, salt: string, voter: string): Hex {
  const voteByte: Hex = vote ? "0x01" : "0x00";
  return sha256(concat([voteByte, assertBytes32(salt, "salt"), assertBytes32(voter, "voter")]));
}
