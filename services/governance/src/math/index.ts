/**
 * Weight arithmetic
 *
 * All weights, tallies and counters are unsigned 64-bit; timestamps are
 * signed 64-bit seconds that must also stay within the safe-integer range.
 */

import { U64_MAX } from "@sealvote/shared";
import { ArithmeticError, ValidationError } from "../errors/index.js";

/**
 * Integer floor square root by Newton's method.
 *
 * Starts at ceil(n / 2) and descends monotonically; stops at the first
 * iterate that fails to decrease.
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) {
    throw new ValidationError("NEGATIVE_INPUT", "isqrt is undefined for negative input", {
      n: n.toString(),
    });
  }
  if (n === 0n) return 0n;

  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

export function assertU64(value: bigint, field: string): bigint {
  if (value < 0n || value > U64_MAX) {
    throw new ArithmeticError("OVERFLOW", `${field} does not fit in an unsigned 64-bit integer`, {
      field,
      value: value.toString(),
    });
  }
  return value;
}

export function checkedAddU64(a: bigint, b: bigint, field: string): bigint {
  return assertU64(a + b, field);
}

export function checkedSubU64(a: bigint, b: bigint, field: string): bigint {
  return assertU64(a - b, field);
}

/**
 * Adds a duration to a timestamp. Results beyond the safe-integer range
 * would lose precision and are treated as overflow.
 */
export function checkedAddSeconds(timestamp: number, seconds: number, field: string): number {
  const result = timestamp + seconds;
  if (!Number.isSafeInteger(result)) {
    throw new ArithmeticError("OVERFLOW", `${field} overflows the timestamp range`, {
      field,
      timestamp,
      seconds,
    });
  }
  return result;
}
