/**
 * @tanglekit/signer — Secret store.
 *
 * The passphrase-protected home of the wallet seed. The store hands out no
 * plaintext: decryption happens only inside SecureSigner.unlock.
 */

import { randomBytes } from "node:crypto";
import { WalletError } from "@tanglekit/types";
import type { SecretStoreBackend } from "./secret-store-backend.js";
import type { SecretSnapshot } from "./kdf.js";
import { DEFAULT_KDF_ITERATIONS, decryptSeed, encryptSeed } from "./kdf.js";

const DEFAULT_SEED_LENGTH = 64;

export interface CreateSecretStoreOptions {
  /** Seed to protect; a random 64-byte seed when omitted. */
  readonly seed?: Uint8Array;
  readonly iterations?: number;
  /** Replace an existing store instead of failing. */
  readonly overwrite?: boolean;
}

export class SecretStore {
  private readonly _backend: SecretStoreBackend;
  private _snapshot: SecretSnapshot;

  private constructor(backend: SecretStoreBackend, snapshot: SecretSnapshot) {
    this._backend = backend;
    this._snapshot = snapshot;
  }

  /**
   * Encrypt a seed into a new store. Refuses to replace an existing one
   * unless `overwrite` is set.
   */
  static async create(
    backend: SecretStoreBackend,
    passphrase: string,
    options: CreateSecretStoreOptions = {},
  ): Promise<SecretStore> {
    if (options.overwrite !== true && backend.read() !== undefined) {
      throw new Error(`Secret store already exists at ${backend.location}`);
    }
    const seed = options.seed ?? new Uint8Array(randomBytes(DEFAULT_SEED_LENGTH));
    if (seed.length < 16 || seed.length > 64) {
      throw new Error(`Seed must be 16..64 bytes, got ${String(seed.length)}`);
    }
    const snapshot = await encryptSeed(seed, passphrase, options.iterations ?? DEFAULT_KDF_ITERATIONS);
    if (options.seed === undefined) seed.fill(0);
    backend.write(snapshot);
    return new SecretStore(backend, snapshot);
  }

  /**
   * Open an existing store.
   *
   * @throws WalletError STORE_NOT_FOUND when the backend holds no snapshot
   */
  static open(backend: SecretStoreBackend): SecretStore {
    const snapshot = backend.read();
    if (snapshot === undefined) {
      throw new WalletError("STORE_NOT_FOUND", `No secret store at ${backend.location}`);
    }
    return new SecretStore(backend, snapshot);
  }

  get location(): string {
    return this._backend.location;
  }

  get iterations(): number {
    return this._snapshot.iterations;
  }

  /** The encrypted snapshot this store guards. */
  get snapshot(): SecretSnapshot {
    return this._snapshot;
  }

  /**
   * Re-encrypt the seed under a new passphrase, with a fresh salt and iv.
   *
   * @throws WalletError WRONG_PASSPHRASE when the current passphrase is wrong
   */
  async changePassphrase(current: string, next: string): Promise<void> {
    const seed = await decryptSeed(this._snapshot, current);
    try {
      const snapshot = await encryptSeed(seed, next, this._snapshot.iterations);
      this._backend.write(snapshot);
      this._snapshot = snapshot;
    } finally {
      seed.fill(0);
    }
  }
}
