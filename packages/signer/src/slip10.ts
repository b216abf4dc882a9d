/**
 * @tanglekit/signer — SLIP-10 Ed25519 key derivation.
 *
 * Ed25519 supports hardened derivation only:
 *
 *   master  = HMAC-SHA512("ed25519 seed", seed)
 *   child_i = HMAC-SHA512(chainCode, 0x00 ‖ key ‖ ser32(i + 2^31))
 *
 * The left 32 bytes are the private key, the right 32 the chain code.
 */

import { createHmac } from "node:crypto";
import type { Bip44Chain } from "@tanglekit/types";

const HARDENED_OFFSET = 0x80000000;
const BIP44_PURPOSE = 44;

export interface ExtendedKey {
  readonly key: Uint8Array;
  readonly chainCode: Uint8Array;
}

function split(digest: Buffer): ExtendedKey {
  return { key: new Uint8Array(digest.subarray(0, 32)), chainCode: new Uint8Array(digest.subarray(32)) };
}

export function masterKey(seed: Uint8Array): ExtendedKey {
  return split(createHmac("sha512", "ed25519 seed").update(seed).digest());
}

export function deriveHardened(parent: ExtendedKey, index: number): ExtendedKey {
  if (!Number.isInteger(index) || index < 0 || index >= HARDENED_OFFSET) {
    throw new RangeError(`Derivation index must be in 0..2^31-1, got ${String(index)}`);
  }
  const data = Buffer.alloc(37);
  data.set(parent.key, 1);
  data.writeUInt32BE(index + HARDENED_OFFSET, 33);
  const child = split(createHmac("sha512", parent.chainCode).update(data).digest());
  data.fill(0);
  return child;
}

/** Path segments of a BIP-44 chain, every one hardened. */
export function bip44Path(chain: Bip44Chain): number[] {
  return [BIP44_PURPOSE, chain.coinType, chain.account, chain.change, chain.addressIndex];
}

export function formatPath(chain: Bip44Chain): string {
  return `m/${bip44Path(chain).map((i) => `${String(i)}'`).join("/")}`;
}

/**
 * Derive the private key of a chain. Intermediate keys are zeroed; the caller
 * zeroes the returned key.
 */
export function derivePrivateKey(seed: Uint8Array, chain: Bip44Chain): Uint8Array {
  let node = masterKey(seed);
  for (const index of bip44Path(chain)) {
    const next = deriveHardened(node, index);
    node.key.fill(0);
    node.chainCode.fill(0);
    node = next;
  }
  node.chainCode.fill(0);
  return node.key;
}
