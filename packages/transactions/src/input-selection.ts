/**
 * @tanglekit/transactions — Input selection.
 *
 * Picks the account outputs that fund a set of target outputs and decides
 * what happens to the surplus.
 *
 * Rules:
 * - Only plain basic outputs are candidates: owned through an address
 *   unlock condition by the record's Ed25519 address, without storage
 *   deposit return, timelock or expiration conditions
 * - Native tokens are covered first (token id ascending, largest holder
 *   first), then the base amount (largest first, ties by output id)
 * - Leftover native tokens always go to a change output, whose deposit is
 *   part of the base requirement
 * - A base surplus too small to stand as its own output is added to the
 *   first target; otherwise it becomes the change output
 * - Same candidates and targets, same selection
 */

import {
  InsufficientFundsError,
  OUTPUT_TYPE,
  UNLOCK_CONDITION_TYPE,
  WalletError,
  addressesEqual,
} from "@tanglekit/types";
import type { Address, BasicOutput, HexString, NativeToken, Output, ProtocolParameters } from "@tanglekit/types";
import { addU256, addU64, computeBalance, subU256, subU64, tokenAmount } from "@tanglekit/account";
import type { Balance, OutputRecord } from "@tanglekit/account";
import { addressUnlockCondition, buildBasicOutput, minimumBasicOutputDeposit } from "@tanglekit/outputs";

export interface SelectionRequest {
  /** Outputs the account may spend right now. */
  readonly candidates: readonly OutputRecord[];
  /** Outputs the transaction must create, in order. */
  readonly targets: readonly Output[];
  readonly protocol: ProtocolParameters;
  /** Owner of the change output. */
  readonly remainderAddress: Address;
}

export interface InputSelection {
  /** Chosen inputs in the order they were picked. */
  readonly inputs: readonly OutputRecord[];
  /** The targets, the first possibly carrying folded surplus, then the change output if any. */
  readonly outputs: readonly Output[];
  readonly remainder: BasicOutput | undefined;
}

const BLOCKING_CONDITIONS: ReadonlySet<number> = new Set([
  UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN,
  UNLOCK_CONDITION_TYPE.TIMELOCK,
  UNLOCK_CONDITION_TYPE.EXPIRATION,
]);

/** Whether an output can be spent by a plain signature from its owner. */
export function isSelectable(record: OutputRecord): boolean {
  const { output } = record;
  if (output.type !== OUTPUT_TYPE.BASIC) return false;
  if (output.unlockConditions.some((uc) => BLOCKING_CONDITIONS.has(uc.type))) return false;
  return output.unlockConditions.some(
    (uc) => uc.type === UNLOCK_CONDITION_TYPE.ADDRESS && addressesEqual(uc.address, record.address),
  );
}

function heldAmount(record: OutputRecord, tokenId: HexString): bigint {
  let total = 0n;
  for (const token of record.output.nativeTokens) {
    if (token.id.toLowerCase() === tokenId) total = addU256(total, token.amount);
  }
  return total;
}

function descendingBy(amount: (r: OutputRecord) => bigint) {
  return (a: OutputRecord, b: OutputRecord): number => {
    const x = amount(a);
    const y = amount(b);
    if (x !== y) return x > y ? -1 : 1;
    const idA = a.outputId.toLowerCase();
    const idB = b.outputId.toLowerCase();
    return idA < idB ? -1 : idA > idB ? 1 : 0;
  };
}

/** Native tokens held by `selected` beyond what `required` consumes. */
function tokenSurplus(selected: Balance, required: Balance): NativeToken[] {
  const surplus: NativeToken[] = [];
  for (const [id, held] of selected.nativeTokens) {
    const rest = subU256(held, tokenAmount(required, id));
    if (rest > 0n) surplus.push({ id, amount: rest });
  }
  return surplus;
}

/**
 * Choose inputs for `targets`.
 *
 * @throws InsufficientFundsError when no subset of the candidates covers an asset
 * @throws WalletError INVALID_TRANSACTION when there are no targets
 */
export function selectInputs(request: SelectionRequest): InputSelection {
  const { protocol, remainderAddress, targets } = request;
  const [first, ...rest] = targets;
  if (first === undefined) {
    throw new WalletError("INVALID_TRANSACTION", "A transaction needs at least one output");
  }

  const required = computeBalance(targets);
  const pool = request.candidates.filter(isSelectable);
  const poolBalance = computeBalance(pool.map((r) => r.output));

  const selected: OutputRecord[] = [];
  const chosen = new Set<string>();
  const take = (record: OutputRecord): void => {
    selected.push(record);
    chosen.add(record.outputId);
  };
  const selectedBalance = (): Balance => computeBalance(selected.map((r) => r.output));

  // ─── Native tokens ──────────────────────────────────────────────────

  for (const [tokenId, needed] of required.nativeTokens) {
    let have = tokenAmount(selectedBalance(), tokenId);
    if (have >= needed) continue;

    const holders = pool
      .filter((r) => !chosen.has(r.outputId) && heldAmount(r, tokenId) > 0n)
      .sort(descendingBy((r) => heldAmount(r, tokenId)));
    for (const record of holders) {
      if (have >= needed) break;
      take(record);
      have = addU256(have, heldAmount(record, tokenId));
    }
    if (have < needed) {
      throw new InsufficientFundsError(tokenId, needed, tokenAmount(poolBalance, tokenId));
    }
  }

  // ─── Base amount ────────────────────────────────────────────────────

  const byAmount = [...pool].sort(descendingBy((r) => r.output.amount));
  const changeUnlock = [addressUnlockCondition(remainderAddress)];

  for (;;) {
    const balance = selectedBalance();
    const surplus = tokenSurplus(balance, required);
    const changeDeposit =
      surplus.length > 0
        ? buildBasicOutput(protocol, { amount: "minimum", nativeTokens: surplus, unlockConditions: changeUnlock }).amount
        : 0n;
    const needed = addU64(required.baseAmount, changeDeposit);
    if (balance.baseAmount >= needed) break;

    const next = byAmount.find((r) => !chosen.has(r.outputId));
    if (next === undefined) {
      throw new InsufficientFundsError("base", needed, poolBalance.baseAmount);
    }
    take(next);
  }

  // ─── Remainder ──────────────────────────────────────────────────────

  const balance = selectedBalance();
  const surplus = tokenSurplus(balance, required);
  const baseSurplus = subU64(balance.baseAmount, required.baseAmount);

  if (surplus.length > 0) {
    const remainder = buildBasicOutput(protocol, {
      amount: baseSurplus,
      nativeTokens: surplus,
      unlockConditions: changeUnlock,
    });
    return { inputs: selected, outputs: [...targets, remainder], remainder };
  }

  if (baseSurplus === 0n) {
    return { inputs: selected, outputs: [...targets], remainder: undefined };
  }

  if (baseSurplus < minimumBasicOutputDeposit(protocol, remainderAddress)) {
    const folded: Output = { ...first, amount: addU64(first.amount, baseSurplus) };
    return { inputs: selected, outputs: [folded, ...rest], remainder: undefined };
  }

  const remainder = buildBasicOutput(protocol, { amount: baseSurplus, unlockConditions: changeUnlock });
  return { inputs: selected, outputs: [...targets, remainder], remainder };
}
