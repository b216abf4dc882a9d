/**
 * @tanglekit/transactions — Transaction wire format.
 *
 * Binary layout of the regular transaction essence and the transaction
 * payload, the inputs commitment, and the ids derived from them.
 *
 * Layout (little-endian):
 *   essence  = u8 type(1) | u64 networkId | u16 n | n × input
 *              | 32 inputsCommitment | u16 m | m × output | u32 payloadLength(0)
 *   input    = u8 type(0) | 32 transactionId | u16 outputIndex
 *   payload  = u32 type(6) | essence | u16 k | k × unlock
 *   unlock   = u8 0 | u8 0 | 32 publicKey | 64 signature
 *            | u8 1 | u16 reference
 */

import {
  ESSENCE_TYPE_REGULAR,
  INPUT_TYPE_UTXO,
  PAYLOAD_TYPE_TRANSACTION,
  UNLOCK_TYPE,
  WalletError,
} from "@tanglekit/types";
import type {
  HexString,
  Output,
  OutputId,
  TransactionEssence,
  TransactionPayload,
  Unlock,
  UtxoInput,
} from "@tanglekit/types";
import { HASH_LENGTH, U16_MAX, WriteStream, blake2b256, concatBytes, fromHex, toHex } from "@tanglekit/codec";
import { serializeOutput, writeOutput } from "@tanglekit/outputs";

export const OUTPUT_ID_LENGTH = HASH_LENGTH + 2;
export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

// =============================================================================
// Ids
// =============================================================================

/** Network id: the first 8 bytes of BLAKE2b-256(networkName) as u64 LE. */
export function networkIdFromName(networkName: string): bigint {
  const hash = blake2b256(new TextEncoder().encode(networkName));
  return new DataView(hash.buffer, hash.byteOffset, hash.byteLength).getBigUint64(0, true);
}

/** transactionId ‖ u16 LE index, as lowercase hex. */
export function buildOutputId(transactionId: HexString, index: number): OutputId {
  if (!Number.isInteger(index) || index < 0 || index > U16_MAX) {
    throw new WalletError("INVALID_ENCODING", `Output index ${String(index)} does not fit in u16`);
  }
  const bytes = new Uint8Array(OUTPUT_ID_LENGTH);
  bytes.set(fromHex(transactionId, HASH_LENGTH));
  new DataView(bytes.buffer).setUint16(HASH_LENGTH, index, true);
  return toHex(bytes);
}

/**
 * Split an output id into the input that consumes it.
 *
 * @throws WalletError INVALID_ENCODING if the id is not 34 bytes of hex
 */
export function outputIdToInput(outputId: OutputId): UtxoInput {
  const bytes = fromHex(outputId, OUTPUT_ID_LENGTH);
  return {
    type: INPUT_TYPE_UTXO,
    transactionId: toHex(bytes.subarray(0, HASH_LENGTH)),
    transactionOutputIndex: new DataView(bytes.buffer, bytes.byteOffset).getUint16(HASH_LENGTH, true),
  };
}

/** BLAKE2b-256 over the concatenated BLAKE2b-256 hashes of the consumed outputs. */
export function inputsCommitment(consumed: readonly Output[]): HexString {
  return toHex(blake2b256(concatBytes(...consumed.map((o) => blake2b256(serializeOutput(o))))));
}

// =============================================================================
// Serialization
// =============================================================================

function writeEssence(stream: WriteStream, essence: TransactionEssence): void {
  stream.writeU8(essence.type);
  stream.writeU64(essence.networkId);
  stream.writeU16(essence.inputs.length);
  for (const input of essence.inputs) {
    stream.writeU8(input.type);
    stream.writeBytes(fromHex(input.transactionId, HASH_LENGTH));
    stream.writeU16(input.transactionOutputIndex);
  }
  stream.writeBytes(fromHex(essence.inputsCommitment, HASH_LENGTH));
  stream.writeU16(essence.outputs.length);
  for (const output of essence.outputs) {
    writeOutput(stream, output);
  }
  // no tagged data payload
  stream.writeU32(0);
}

function writeUnlock(stream: WriteStream, unlock: Unlock): void {
  stream.writeU8(unlock.type);
  if (unlock.type === UNLOCK_TYPE.REFERENCE) {
    stream.writeU16(unlock.reference);
    return;
  }
  stream.writeU8(unlock.signature.type);
  stream.writeBytes(fromHex(unlock.signature.publicKey, PUBLIC_KEY_LENGTH));
  stream.writeBytes(fromHex(unlock.signature.signature, SIGNATURE_LENGTH));
}

export function serializeEssence(essence: TransactionEssence): Uint8Array {
  const stream = new WriteStream();
  writeEssence(stream, essence);
  return stream.finish();
}

/** The message every input's signature signs. */
export function essenceHash(essence: TransactionEssence): Uint8Array {
  return blake2b256(serializeEssence(essence));
}

export function serializeTransactionPayload(payload: TransactionPayload): Uint8Array {
  const stream = new WriteStream();
  stream.writeU32(payload.type);
  writeEssence(stream, payload.essence);
  stream.writeU16(payload.unlocks.length);
  for (const unlock of payload.unlocks) {
    writeUnlock(stream, unlock);
  }
  return stream.finish();
}

/** BLAKE2b-256 of the serialized payload. */
export function transactionIdOf(payloadBytes: Uint8Array): HexString {
  return toHex(blake2b256(payloadBytes));
}

export function createEssence(
  networkName: string,
  inputs: readonly { readonly outputId: OutputId; readonly output: Output }[],
  outputs: readonly Output[],
): TransactionEssence {
  return {
    type: ESSENCE_TYPE_REGULAR,
    networkId: networkIdFromName(networkName),
    inputs: inputs.map((i) => outputIdToInput(i.outputId)),
    inputsCommitment: inputsCommitment(inputs.map((i) => i.output)),
    outputs: [...outputs],
  };
}

export function createPayload(essence: TransactionEssence, unlocks: readonly Unlock[]): TransactionPayload {
  return { type: PAYLOAD_TYPE_TRANSACTION, essence, unlocks: [...unlocks] };
}
