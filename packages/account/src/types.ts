/**
 * @tanglekit/account — Domain types.
 */

import type {
  Bip44Chain,
  Ed25519Address,
  HexString,
  Output,
  OutputId,
  ProtocolParameters,
} from "@tanglekit/types";

/** An address the account controls, with the chain its key derives from. */
export interface AccountAddress {
  readonly address: Ed25519Address;
  readonly bech32: string;
  readonly chain: Bip44Chain;
  /** True for change (remainder) addresses. */
  readonly internal: boolean;
}

/** An unspent output owned by one of the account's addresses. */
export interface OutputRecord {
  readonly outputId: OutputId;
  readonly output: Output;
  /** The account address whose key unlocks the output. */
  readonly address: Ed25519Address;
  readonly chain: Bip44Chain;
}

/** Aggregate holdings: base amount plus native tokens keyed by token id. */
export interface Balance {
  readonly baseAmount: bigint;
  /** Keys are normalized token ids, iterated in ascending order. */
  readonly nativeTokens: ReadonlyMap<HexString, bigint>;
}

export interface AccountBalance {
  /** Everything in the unspent set. */
  readonly total: Balance;
  /** Unspent outputs that are neither reserved nor pending. */
  readonly available: Balance;
  /** Sum of the minimum storage deposits of the unspent set. */
  readonly requiredStorageDeposit: bigint;
  readonly pendingOutputs: number;
}

/** Tentative hold on inputs while a transaction is built and signed. */
export interface Reservation {
  readonly id: number;
  readonly outputIds: readonly OutputId[];
}

export interface AccountOptions {
  readonly alias: string;
  readonly index: number;
  readonly coinType: number;
  readonly protocol: ProtocolParameters;
  readonly addresses?: readonly AccountAddress[];
  /** Destination of change outputs; defaults to the first public address. */
  readonly remainderAddress?: AccountAddress;
}
