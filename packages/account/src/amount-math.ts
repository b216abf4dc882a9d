/**
 * @tanglekit/account — Checked amount arithmetic.
 *
 * Base amounts are u64, native token amounts u256. All arithmetic is bigint
 * and every result is range-checked; leaving the range is an OverflowError,
 * never a wrap.
 *
 * Rules:
 * - No floating-point operations
 * - Negative results are underflows
 */

import { OverflowError } from "@tanglekit/types";
import { U64_MAX, U256_MAX } from "@tanglekit/codec";

function checked(value: bigint, max: bigint, width: string, op: string): bigint {
  if (value < 0n) {
    throw new OverflowError(`${width} underflow in ${op}: result ${value.toString()}`);
  }
  if (value > max) {
    throw new OverflowError(`${width} overflow in ${op}: result ${value.toString()} exceeds ${max.toString()}`);
  }
  return value;
}

export function addU64(a: bigint, b: bigint): bigint {
  return checked(a + b, U64_MAX, "u64", "addition");
}

export function subU64(a: bigint, b: bigint): bigint {
  return checked(a - b, U64_MAX, "u64", "subtraction");
}

export function addU256(a: bigint, b: bigint): bigint {
  return checked(a + b, U256_MAX, "u256", "addition");
}

export function subU256(a: bigint, b: bigint): bigint {
  return checked(a - b, U256_MAX, "u256", "subtraction");
}

/** Checked u64 sum of a list. */
export function sumU64(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total = addU64(total, v);
  return total;
}
