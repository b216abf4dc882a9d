/**
 * Tests for the transaction wire format and derived ids.
 */

import { describe, it, expect } from "vitest";
import { PAYLOAD_TYPE_TRANSACTION, SIGNATURE_TYPE_ED25519, UNLOCK_TYPE, isWalletError } from "@tanglekit/types";
import { blake2b256, concatBytes, toHex } from "@tanglekit/codec";
import { serializeOutput } from "@tanglekit/outputs";
import {
  buildOutputId,
  createEssence,
  createPayload,
  essenceHash,
  inputsCommitment,
  networkIdFromName,
  outputIdToInput,
  serializeEssence,
  serializeTransactionPayload,
  transactionIdOf,
} from "../src/essence.js";
import { FOREIGN, foreignOwner, record, toRecipient } from "./fixtures.js";

const TX_ID = `0x${"ab".repeat(32)}`;

describe("ids", () => {
  it("derives the network id from the first 8 hash bytes, little-endian", () => {
    const hash = blake2b256(new TextEncoder().encode("testnet"));
    let expected = 0n;
    for (let i = 7; i >= 0; i--) expected = (expected << 8n) | BigInt(hash[i] ?? 0);

    expect(networkIdFromName("testnet")).toBe(expected);
    expect(networkIdFromName("mainnet")).not.toBe(expected);
  });

  it("builds and splits output ids", () => {
    const id = buildOutputId(TX_ID, 258);
    expect(id).toBe(`${TX_ID}0201`);
    expect(outputIdToInput(id)).toEqual({ type: 0, transactionId: TX_ID, transactionOutputIndex: 258 });
  });

  it("rejects malformed output ids and indexes", () => {
    expect(() => outputIdToInput(TX_ID)).toThrow("Expected 34 bytes");
    try {
      buildOutputId(TX_ID, 70_000);
      expect.fail("expected an encoding error");
    } catch (err: unknown) {
      expect(isWalletError(err, "INVALID_ENCODING")).toBe(true);
    }
  });

  it("commits to the hashes of the consumed outputs in order", () => {
    const a = record(1, 100_000n, foreignOwner()).output;
    const b = record(2, 200_000n, foreignOwner()).output;
    const expected = toHex(blake2b256(concatBytes(blake2b256(serializeOutput(a)), blake2b256(serializeOutput(b)))));

    expect(inputsCommitment([a, b])).toBe(expected);
    expect(inputsCommitment([b, a])).not.toBe(expected);
  });
});

describe("serialization", () => {
  const input = record(1, 42_600n, foreignOwner());
  const output = toRecipient(42_600n);
  const essence = createEssence("testnet", [input], [output]);

  it("lays out the essence", () => {
    const bytes = serializeEssence(essence);
    // 1 + 8 + 2 + 35 + 32 + 2 + 46 + 4
    expect(bytes).toHaveLength(130);
    expect(bytes[0]).toBe(1);
    expect(Array.from(bytes.subarray(9, 11))).toEqual([1, 0]);
    expect(bytes[11]).toBe(0);
    expect(toHex(bytes.subarray(12, 44))).toBe(`0x${"00".repeat(31)}01`);
    expect(toHex(bytes.subarray(46, 78))).toBe(essence.inputsCommitment);
    expect(Array.from(bytes.subarray(78, 80))).toEqual([1, 0]);
    expect(toHex(bytes.subarray(80, 126))).toBe(toHex(serializeOutput(output)));
    expect(Array.from(bytes.subarray(126))).toEqual([0, 0, 0, 0]);
  });

  it("hashes the serialized essence", () => {
    expect(toHex(essenceHash(essence))).toBe(toHex(blake2b256(serializeEssence(essence))));
  });

  it("lays out the payload with both unlock kinds", () => {
    const payload = createPayload(essence, [
      {
        type: UNLOCK_TYPE.SIGNATURE,
        signature: {
          type: SIGNATURE_TYPE_ED25519,
          publicKey: `0x${"01".repeat(32)}`,
          signature: `0x${"02".repeat(64)}`,
        },
      },
      { type: UNLOCK_TYPE.REFERENCE, reference: 0 },
    ]);
    const bytes = serializeTransactionPayload(payload);

    expect(payload.type).toBe(PAYLOAD_TYPE_TRANSACTION);
    // 4 + 130 + 2 + 98 + 3
    expect(bytes).toHaveLength(237);
    expect(Array.from(bytes.subarray(0, 4))).toEqual([6, 0, 0, 0]);
    expect(toHex(bytes.subarray(4, 134))).toBe(toHex(serializeEssence(essence)));
    expect(Array.from(bytes.subarray(134, 138))).toEqual([2, 0, 0, 0]);
    expect(Array.from(bytes.subarray(234))).toEqual([1, 0, 0]);
    expect(transactionIdOf(bytes)).toBe(toHex(blake2b256(bytes)));
  });

  it("is deterministic", () => {
    const again = createEssence("testnet", [record(1, 42_600n, { ...foreignOwner(), address: FOREIGN })], [toRecipient(42_600n)]);
    expect(toHex(serializeEssence(again))).toBe(toHex(serializeEssence(essence)));
  });
});
