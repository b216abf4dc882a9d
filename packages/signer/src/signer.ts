/**
 * @tanglekit/signer — Secure signer.
 *
 * unlock() decrypts the seed into a SignerSession, the only object able to
 * sign. The session derives per-address keys on demand, signs, and zeroes
 * them again; private keys and the seed never leave it.
 *
 * Rules:
 * - A released session fails every call with SIGNER_LOCKED
 * - Concurrent sign calls on one session run one at a time
 * - Addresses the session cannot reproduce are left out of the result
 */

import { ed25519 } from "@noble/curves/ed25519";
import { SIGNATURE_TYPE_ED25519, WalletError } from "@tanglekit/types";
import type { Bip44Chain, Ed25519Address, Ed25519Signature } from "@tanglekit/types";
import { ed25519AddressFromPublicKey, toHex } from "@tanglekit/codec";
import type { SecretStore } from "./secret-store.js";
import { decryptSeed } from "./kdf.js";
import { derivePrivateKey } from "./slip10.js";

/** An address whose signature a transaction needs, with its key chain. */
export interface RequiredAddress {
  readonly address: Ed25519Address;
  readonly chain: Bip44Chain;
}

/** A public address produced by the session. */
export interface GeneratedAddress {
  readonly address: Ed25519Address;
  readonly chain: Bip44Chain;
  readonly internal: boolean;
}

export interface AddressRange {
  readonly start: number;
  /** Exclusive. */
  readonly end: number;
}

export interface UnlockOptions {
  /** Release the session automatically after this many milliseconds. */
  readonly autoLockMs?: number;
}

/** Key of a signature in the map returned by sign(): the lowercase address hash. */
export function signatureKey(address: Ed25519Address): string {
  return address.pubKeyHash.toLowerCase();
}

// =============================================================================
// Session
// =============================================================================

export class SignerSession {
  private _seed: Uint8Array | undefined;
  private _queue: Promise<void> = Promise.resolve();
  private _timer: ReturnType<typeof setTimeout> | undefined;

  /** @internal Sessions come from SecureSigner.unlock. */
  constructor(seed: Uint8Array, options: UnlockOptions = {}) {
    this._seed = seed;
    if (options.autoLockMs !== undefined) {
      this._timer = setTimeout(() => this.release(), options.autoLockMs);
      this._timer.unref();
    }
  }

  get isReleased(): boolean {
    return this._seed === undefined;
  }

  /** Zero the seed. Idempotent. */
  release(): void {
    if (this._timer !== undefined) {
      clearTimeout(this._timer);
      this._timer = undefined;
    }
    if (this._seed !== undefined) {
      this._seed.fill(0);
      this._seed = undefined;
    }
  }

  /**
   * Sign a transaction essence hash for each required address.
   *
   * @returns Signatures keyed by signatureKey(address)
   * @throws WalletError SIGNER_LOCKED once the session is released
   */
  sign(essenceHash: Uint8Array, required: readonly RequiredAddress[]): Promise<Map<string, Ed25519Signature>> {
    return this.serialized(() => {
      const seed = this.requireSeed();
      const signatures = new Map<string, Ed25519Signature>();

      for (const { address, chain } of required) {
        const key = signatureKey(address);
        if (signatures.has(key)) continue;

        const privateKey = derivePrivateKey(seed, chain);
        try {
          const publicKey = ed25519.getPublicKey(privateKey);
          if (ed25519AddressFromPublicKey(publicKey).pubKeyHash !== key) continue;
          signatures.set(key, {
            type: SIGNATURE_TYPE_ED25519,
            publicKey: toHex(publicKey),
            signature: toHex(ed25519.sign(essenceHash, privateKey)),
          });
        } finally {
          privateKey.fill(0);
        }
      }

      return signatures;
    });
  }

  /**
   * Derive public addresses for `m/44'/coinType'/accountIndex'/change'/i'`,
   * i in [range.start, range.end).
   */
  generateAddresses(
    coinType: number,
    accountIndex: number,
    range: AddressRange,
    internal = false,
  ): Promise<GeneratedAddress[]> {
    return this.serialized(() => {
      const seed = this.requireSeed();
      const addresses: GeneratedAddress[] = [];
      for (let addressIndex = range.start; addressIndex < range.end; addressIndex++) {
        const chain: Bip44Chain = { coinType, account: accountIndex, change: internal ? 1 : 0, addressIndex };
        const privateKey = derivePrivateKey(seed, chain);
        try {
          addresses.push({ address: ed25519AddressFromPublicKey(ed25519.getPublicKey(privateKey)), chain, internal });
        } finally {
          privateKey.fill(0);
        }
      }
      return addresses;
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requireSeed(): Uint8Array {
    if (this._seed === undefined) {
      throw new WalletError("SIGNER_LOCKED", "Signer session has been released");
    }
    return this._seed;
  }

  private serialized<T>(task: () => T): Promise<T> {
    const run = this._queue.then(task);
    this._queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

// =============================================================================
// Signer
// =============================================================================

export class SecureSigner {
  private readonly _store: SecretStore;

  constructor(store: SecretStore) {
    this._store = store;
  }

  /**
   * Decrypt the seed into a new session.
   *
   * @throws WalletError WRONG_PASSPHRASE when the passphrase does not open the store
   */
  async unlock(passphrase: string, options: UnlockOptions = {}): Promise<SignerSession> {
    const seed = await decryptSeed(this._store.snapshot, passphrase);
    return new SignerSession(seed, options);
  }
}
