/**
 * @tanglekit/account — Balance aggregation.
 *
 * Folds outputs into a Balance. Pure and deterministic: the result depends
 * only on the multiset of outputs, never on their order.
 *
 * Rules:
 * - Base amounts accumulate as u64, native tokens as u256 (checked)
 * - Token ids are normalized; the map iterates in ascending id order
 * - computeBalance(A ∪ B) equals mergeBalances(computeBalance(A), computeBalance(B))
 */

import type { HexString, NativeToken, Output } from "@tanglekit/types";
import { normalizeTokenId } from "@tanglekit/codec";
import type { Balance } from "./types.js";
import { addU64, addU256 } from "./amount-math.js";

export function emptyBalance(): Balance {
  return { baseAmount: 0n, nativeTokens: new Map() };
}

function sortedTokens(tokens: Map<HexString, bigint>): ReadonlyMap<HexString, bigint> {
  return new Map([...tokens.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function accumulateTokens(into: Map<HexString, bigint>, tokens: Iterable<NativeToken>): void {
  for (const token of tokens) {
    const id = normalizeTokenId(token.id);
    into.set(id, addU256(into.get(id) ?? 0n, token.amount));
  }
}

/**
 * Aggregate the base amount and native tokens of a set of outputs.
 *
 * @throws OverflowError if a total leaves its integer range
 */
export function computeBalance(outputs: Iterable<Output>): Balance {
  let baseAmount = 0n;
  const tokens = new Map<HexString, bigint>();

  for (const output of outputs) {
    baseAmount = addU64(baseAmount, output.amount);
    accumulateTokens(tokens, output.nativeTokens);
  }

  return { baseAmount, nativeTokens: sortedTokens(tokens) };
}

export function mergeBalances(a: Balance, b: Balance): Balance {
  const tokens = new Map(a.nativeTokens);
  for (const [id, amount] of b.nativeTokens) {
    tokens.set(id, addU256(tokens.get(id) ?? 0n, amount));
  }
  return { baseAmount: addU64(a.baseAmount, b.baseAmount), nativeTokens: sortedTokens(tokens) };
}

/** Native token amount held in a balance, zero when absent. */
export function tokenAmount(balance: Balance, tokenId: HexString): bigint {
  return balance.nativeTokens.get(normalizeTokenId(tokenId)) ?? 0n;
}
