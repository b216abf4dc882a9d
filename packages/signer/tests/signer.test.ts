/**
 * Tests for SecureSigner, SignerSession and SLIP-10 derivation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ed25519 } from "@noble/curves/ed25519";
import { ADDRESS_TYPE, isWalletError } from "@tanglekit/types";
import type { Ed25519Address, WalletErrorCode } from "@tanglekit/types";
import { blake2b256, fromHex, toHex } from "@tanglekit/codec";
import { SecretStore } from "../src/secret-store.js";
import { InMemorySecretStoreBackend } from "../src/secret-store-backend.js";
import { SecureSigner, SignerSession, signatureKey } from "../src/signer.js";
import { deriveHardened, derivePrivateKey, formatPath, masterKey } from "../src/slip10.js";

const ITERATIONS = 1_000;
const SEED = new Uint8Array(64).map((_, i) => i);
const COIN = 4219;
const HASH = blake2b256(new TextEncoder().encode("essence"));

async function expectCode(promise: Promise<unknown>, code: WalletErrorCode): Promise<void> {
  await expect(promise).rejects.toSatisfy((err: unknown) => isWalletError(err, code));
}

let signer: SecureSigner;

beforeEach(async () => {
  const store = await SecretStore.create(new InMemorySecretStoreBackend(), "test-secret", {
    seed: SEED,
    iterations: ITERATIONS,
  });
  signer = new SecureSigner(store);
});

afterEach(() => {
  vi.useRealTimers();
});

describe("SLIP-10", () => {
  it("formats hardened BIP-44 paths", () => {
    expect(formatPath({ coinType: COIN, account: 2, change: 1, addressIndex: 5 })).toBe("m/44'/4219'/2'/1'/5'");
  });

  it("derives deterministically and distinctly per index", () => {
    const root = masterKey(SEED);
    const a = deriveHardened(root, 0);
    const b = deriveHardened(masterKey(SEED), 0);
    const c = deriveHardened(root, 1);
    expect(toHex(a.key)).toBe(toHex(b.key));
    expect(toHex(a.key)).not.toBe(toHex(c.key));
    expect(a.key).toHaveLength(32);
    expect(a.chainCode).toHaveLength(32);
  });

  it("rejects indexes outside the hardened range", () => {
    expect(() => deriveHardened(masterKey(SEED), 2 ** 31)).toThrow(RangeError);
    expect(() => deriveHardened(masterKey(SEED), -1)).toThrow(RangeError);
  });
});

describe("SecureSigner.unlock", () => {
  it("fails with WRONG_PASSPHRASE on a bad passphrase", async () => {
    await expectCode(signer.unlock("not-the-secret"), "WRONG_PASSPHRASE");
  });

  it("returns a live session on the right passphrase", async () => {
    const session = await signer.unlock("test-secret");
    expect(session).toBeInstanceOf(SignerSession);
    expect(session.isReleased).toBe(false);
    session.release();
  });
});

describe("SignerSession", () => {
  it("generates public and internal addresses from the key chain", async () => {
    const session = await signer.unlock("test-secret");
    const publicAddrs = await session.generateAddresses(COIN, 0, { start: 0, end: 3 });
    const internal = await session.generateAddresses(COIN, 0, { start: 0, end: 1 }, true);

    expect(publicAddrs.map((a) => a.chain.addressIndex)).toEqual([0, 1, 2]);
    expect(new Set(publicAddrs.map((a) => a.address.pubKeyHash)).size).toBe(3);
    expect(internal[0]?.chain.change).toBe(1);
    expect(internal[0]?.internal).toBe(true);

    const key = derivePrivateKey(SEED, { coinType: COIN, account: 0, change: 0, addressIndex: 1 });
    expect(publicAddrs[1]?.address.pubKeyHash).toBe(toHex(blake2b256(ed25519.getPublicKey(key))));
    session.release();
  });

  it("signs for addresses it controls with verifiable signatures", async () => {
    const session = await signer.unlock("test-secret");
    const [first] = await session.generateAddresses(COIN, 0, { start: 0, end: 1 });
    if (first === undefined) throw new Error("no address generated");

    const signatures = await session.sign(HASH, [first, first]);
    expect(signatures.size).toBe(1);

    const signature = signatures.get(signatureKey(first.address));
    expect(signature?.type).toBe(0);
    if (signature === undefined) throw new Error("missing signature");
    expect(ed25519.verify(fromHex(signature.signature), HASH, fromHex(signature.publicKey))).toBe(true);
    expect(toHex(blake2b256(fromHex(signature.publicKey)))).toBe(first.address.pubKeyHash);
    session.release();
  });

  it("leaves out addresses whose chain does not reproduce them", async () => {
    const session = await signer.unlock("test-secret");
    const foreign: Ed25519Address = { type: ADDRESS_TYPE.ED25519, pubKeyHash: `0x${"ee".repeat(32)}` };
    const signatures = await session.sign(HASH, [
      { address: foreign, chain: { coinType: COIN, account: 0, change: 0, addressIndex: 0 } },
    ]);
    expect(signatures.size).toBe(0);
    session.release();
  });

  it("fails every call after release", async () => {
    const session = await signer.unlock("test-secret");
    session.release();
    session.release();
    expect(session.isReleased).toBe(true);
    await expectCode(session.sign(HASH, []), "SIGNER_LOCKED");
    await expectCode(session.generateAddresses(COIN, 0, { start: 0, end: 1 }), "SIGNER_LOCKED");
  });

  it("releases itself after the auto-lock delay", async () => {
    vi.useFakeTimers();
    const session = await signer.unlock("test-secret", { autoLockMs: 60_000 });
    vi.advanceTimersByTime(59_999);
    expect(session.isReleased).toBe(false);
    vi.advanceTimersByTime(1);
    expect(session.isReleased).toBe(true);
  });

  it("serializes concurrent calls and fails those queued behind a release", async () => {
    const session = await signer.unlock("test-secret");
    const [addr] = await session.generateAddresses(COIN, 0, { start: 0, end: 1 });
    if (addr === undefined) throw new Error("no address generated");

    const first = session.sign(HASH, [addr]);
    const second = session.sign(HASH, [addr]);
    session.release();

    // both were queued before the release and run after it
    await expectCode(first, "SIGNER_LOCKED");
    await expectCode(second, "SIGNER_LOCKED");
  });
});
