/**
 * Canonical ordering.
 *
 * Unlock conditions and features sort ascending by kind; native tokens sort
 * ascending by id bytes. Ids are normalized lowercase hex of a fixed length,
 * so string order equals byte order.
 */

import type { Feature, NativeToken, UnlockCondition } from "@tanglekit/types";

function byType<T extends { readonly type: number }>(a: T, b: T): number {
  return a.type - b.type;
}

export function sortUnlockConditions(conditions: readonly UnlockCondition[]): UnlockCondition[] {
  return [...conditions].sort(byType);
}

export function sortFeatures(features: readonly Feature[]): Feature[] {
  return [...features].sort(byType);
}

export function sortNativeTokens(tokens: readonly NativeToken[]): NativeToken[] {
  return [...tokens].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
