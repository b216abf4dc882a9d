/**
 * Transaction Types
 *
 * Essence, unlocks and the signed transaction payload, plus the handles
 * used to follow a submitted transaction to inclusion.
 *
 * Rules:
 * - A transaction is immutable once built
 * - Exactly one unlock per input, in input order
 */

import type { HexString } from "./address.js";
import type { Output, OutputId } from "./output.js";

// =============================================================================
// Essence
// =============================================================================

export const INPUT_TYPE_UTXO = 0;
export const ESSENCE_TYPE_REGULAR = 1;
export const PAYLOAD_TYPE_TRANSACTION = 6;

/** Reference to a consumed output. */
export interface UtxoInput {
  readonly type: typeof INPUT_TYPE_UTXO;
  readonly transactionId: HexString;
  readonly transactionOutputIndex: number;
}

export interface TransactionEssence {
  readonly type: typeof ESSENCE_TYPE_REGULAR;
  /** First 8 bytes of BLAKE2b-256(networkName), as u64 LE. */
  readonly networkId: bigint;
  readonly inputs: readonly UtxoInput[];
  /** BLAKE2b-256 over the hashes of the consumed outputs, in input order. */
  readonly inputsCommitment: HexString;
  readonly outputs: readonly Output[];
}

// =============================================================================
// Unlocks
// =============================================================================

export const SIGNATURE_TYPE_ED25519 = 0;

export const UNLOCK_TYPE = {
  SIGNATURE: 0,
  REFERENCE: 1,
} as const;

export interface Ed25519Signature {
  readonly type: typeof SIGNATURE_TYPE_ED25519;
  readonly publicKey: HexString;
  readonly signature: HexString;
}

export interface SignatureUnlock {
  readonly type: typeof UNLOCK_TYPE.SIGNATURE;
  readonly signature: Ed25519Signature;
}

/** Points at an earlier signature unlock for the same address. */
export interface ReferenceUnlock {
  readonly type: typeof UNLOCK_TYPE.REFERENCE;
  readonly reference: number;
}

export type Unlock = SignatureUnlock | ReferenceUnlock;

export interface TransactionPayload {
  readonly type: typeof PAYLOAD_TYPE_TRANSACTION;
  readonly essence: TransactionEssence;
  readonly unlocks: readonly Unlock[];
}

/** A fully signed transaction ready for submission. */
export interface SignedTransaction {
  readonly payload: TransactionPayload;
  /** Canonical serialization of `payload`. */
  readonly bytes: Uint8Array;
  /** BLAKE2b-256 of `bytes`. */
  readonly transactionId: HexString;
  /** Ids of the outputs consumed, in input order. */
  readonly inputIds: readonly OutputId[];
}

// =============================================================================
// Submission & inclusion
// =============================================================================

/** Returned by a successful submission; only used to poll inclusion. */
export interface SubmissionHandle {
  readonly blockId: HexString;
  readonly transactionId: HexString;
}

/** Where a transaction became final. */
export interface InclusionReference {
  readonly blockId: HexString;
  readonly milestoneIndex: number;
}

/** Node-reported state of a submitted block. */
export type InclusionStatus =
  | { readonly kind: "pending" }
  | { readonly kind: "confirmed"; readonly reference: InclusionReference }
  | { readonly kind: "conflicting"; readonly reason?: number | undefined }
  | { readonly kind: "notFound" };
