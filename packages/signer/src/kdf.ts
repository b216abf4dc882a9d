/**
 * @tanglekit/signer — Seed encryption.
 *
 * PBKDF2-SHA-256 derives a 256-bit key from the passphrase; AES-256-GCM
 * encrypts the seed under it. The GCM tag authenticates the ciphertext, so a
 * wrong passphrase surfaces as a tag mismatch and nothing else.
 *
 * Rules:
 * - The KDF always runs with the parameters stored in the snapshot
 * - Derived keys and decrypted seeds are zeroed by their owners after use
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from "node:crypto";
import { promisify } from "node:util";
import { z } from "zod";
import { WalletError } from "@tanglekit/types";
import { fromHex, toHex } from "@tanglekit/codec";

const pbkdf2Async = promisify(pbkdf2);

/** OWASP 2023 guidance for PBKDF2-SHA-256. */
export const DEFAULT_KDF_ITERATIONS = 600_000;

const KEY_LENGTH = 32;
const SALT_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

const HexSchema = z.string().regex(/^0x([0-9a-f]{2})+$/);

export const SecretSnapshotSchema = z.object({
  version: z.literal(1),
  kdf: z.literal("pbkdf2-sha256"),
  iterations: z.number().int().positive(),
  salt: HexSchema,
  iv: HexSchema,
  ciphertext: HexSchema,
  authTag: HexSchema,
});

/** Encrypted seed as persisted by a secret store backend. */
export type SecretSnapshot = z.infer<typeof SecretSnapshotSchema>;

/**
 * Validate a persisted snapshot.
 *
 * @throws WalletError INVALID_ENCODING when the value is not a snapshot
 */
export function parseSnapshot(value: unknown): SecretSnapshot {
  const result = SecretSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new WalletError("INVALID_ENCODING", "Secret store snapshot is malformed", { cause: result.error });
  }
  return result.data;
}

async function deriveKey(passphrase: string, salt: Uint8Array, iterations: number): Promise<Buffer> {
  return pbkdf2Async(passphrase.normalize("NFKD"), salt, iterations, KEY_LENGTH, "sha256");
}

export async function encryptSeed(
  seed: Uint8Array,
  passphrase: string,
  iterations: number = DEFAULT_KDF_ITERATIONS,
): Promise<SecretSnapshot> {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const key = await deriveKey(passphrase, salt, iterations);
  try {
    const cipher = createCipheriv("aes-256-gcm", key, iv, { authTagLength: AUTH_TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(seed), cipher.final()]);
    return {
      version: 1,
      kdf: "pbkdf2-sha256",
      iterations,
      salt: toHex(salt),
      iv: toHex(iv),
      ciphertext: toHex(ciphertext),
      authTag: toHex(cipher.getAuthTag()),
    };
  } finally {
    key.fill(0);
  }
}

/**
 * Decrypt the seed of a snapshot. The caller owns the returned bytes and
 * must zero them.
 *
 * @throws WalletError WRONG_PASSPHRASE when authentication fails
 */
export async function decryptSeed(snapshot: SecretSnapshot, passphrase: string): Promise<Uint8Array> {
  const key = await deriveKey(passphrase, fromHex(snapshot.salt), snapshot.iterations);
  try {
    const decipher = createDecipheriv("aes-256-gcm", key, fromHex(snapshot.iv), { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(fromHex(snapshot.authTag));
    let plain: Buffer;
    try {
      plain = Buffer.concat([decipher.update(fromHex(snapshot.ciphertext)), decipher.final()]);
    } catch (err: unknown) {
      throw new WalletError("WRONG_PASSPHRASE", "Wrong passphrase", { cause: err });
    }
    const seed = new Uint8Array(plain);
    plain.fill(0);
    return seed;
  } finally {
    key.fill(0);
  }
}
