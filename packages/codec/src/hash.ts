/**
 * BLAKE2b-256, the ledger's content hash (ids, address bodies, commitments).
 */

import { blake2b } from "@noble/hashes/blake2b";

export const HASH_LENGTH = 32;

export function blake2b256(...parts: readonly Uint8Array[]): Uint8Array {
  const h = blake2b.create({ dkLen: HASH_LENGTH });
  for (const p of parts) {
    h.update(p);
  }
  return h.digest();
}
