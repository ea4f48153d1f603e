/**
 * Commitment Scheme
 *
 * commitment = sha256(vote_byte ‖ salt ‖ voter)
 *
 * vote_byte is 0x01 for yes and 0x00 for no; salt and voter are 32 bytes each.
 * The digest reveals nothing about the vote while the salt stays secret.
 */

import * as crypto from "crypto";
import { COMMITMENT, type Hex32, type Identity } from "@sealvote/shared";
import { ValidationError } from "../errors/index.js";

export function hexToBytes32(value: string, field: string): Buffer {
  if (!/^0x[a-fA-F0-9]{64}$/.test(value)) {
    throw new ValidationError("INVALID_BYTES32", `${field} must be 32 bytes of 0x-prefixed hex`, {
      field,
    });
  }
  return Buffer.from(value.slice(2), "hex");
}

export function bytesToHex(bytes: Uint8Array): string {
  return `0x${Buffer.from(bytes).toString("hex")}`;
}

export function buildPreimage(vote: boolean, salt: Hex32, voter: Identity): Buffer {
  return Buffer.concat([
    Buffer.from([vote ? COMMITMENT.voteYes : COMMITMENT.voteNo]),
    hexToBytes32(salt, "salt"),
    hexToBytes32(voter, "voter"),
  ]);
}

export function computeCommitment(vote: boolean, salt: Hex32, voter: Identity): Hex32 {
  const digest = crypto
    .createHash(COMMITMENT.algorithm)
    .update(buildPreimage(vote, salt, voter))
    .digest();
  return bytesToHex(digest);
}

/**
 * Recomputes the commitment and compares it in constant time.
 */
export function verifyCommitment(
  stored: Hex32,
  vote: boolean,
  salt: Hex32,
  voter: Identity
): boolean {
  const expected = hexToBytes32(stored, "commitment");
  const actual = hexToBytes32(computeCommitment(vote, salt, voter), "commitment");
  return crypto.timingSafeEqual(expected, actual);
}

/**
 * Deterministic record key: sha256 over a seed label and the seed parts.
 */
export function deriveKey(label: string, ...parts: Array<string | bigint | number>): string {
  const hash = crypto.createHash("sha256").update(label);
  for (const part of parts) {
    hash.update("\u0000");
    if (typeof part === "string" && /^0x[a-fA-F0-9]{64}$/.test(part)) {
      hash.update(Buffer.from(part.slice(2), "hex"));
    } else {
      hash.update(String(part));
    }
  }
  return bytesToHex(hash.digest());
}
