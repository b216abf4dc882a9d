/**
 * @tanglekit/signer — Secret store persistence.
 *
 * A backend holds exactly one encrypted snapshot. Backends never see
 * plaintext: they store and return SecretSnapshot values only.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { WalletError } from "@tanglekit/types";
import type { SecretSnapshot } from "./kdf.js";
import { parseSnapshot } from "./kdf.js";

export interface SecretStoreBackend {
  /** The stored snapshot, or undefined when the store does not exist. */
  read(): SecretSnapshot | undefined;

  /** Replace the stored snapshot. */
  write(snapshot: SecretSnapshot): void;

  /** Human-readable location, for error messages. */
  readonly location: string;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/** Keeps the snapshot in memory. Suitable for tests. */
export class InMemorySecretStoreBackend implements SecretStoreBackend {
  private _snapshot: SecretSnapshot | undefined;
  readonly location = "memory";

  read(): SecretSnapshot | undefined {
    return this._snapshot;
  }

  write(snapshot: SecretSnapshot): void {
    this._snapshot = { ...snapshot };
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * Stores the snapshot as a JSON file. Writes go to a sibling temp file that
 * is renamed over the target, so a crash never leaves a half-written store.
 */
export class FileSecretStoreBackend implements SecretStoreBackend {
  readonly location: string;

  constructor(path: string) {
    this.location = path;
  }

  read(): SecretSnapshot | undefined {
    if (!existsSync(this.location)) {
      return undefined;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.location, "utf-8"));
    } catch (err: unknown) {
      throw new WalletError("INVALID_ENCODING", `Secret store ${this.location} is not valid JSON`, { cause: err });
    }
    return parseSnapshot(raw);
  }

  write(snapshot: SecretSnapshot): void {
    mkdirSync(dirname(this.location), { recursive: true });
    const tmp = `${this.location}.tmp`;
    writeFileSync(tmp, JSON.stringify(snapshot, null, 2), { encoding: "utf-8", mode: 0o600 });
    renameSync(tmp, this.location);
  }
}
