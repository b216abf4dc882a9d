/**
 * Tests for the secret store and its backends.
 *
 * Verifies:
 * - Create / open / change passphrase
 * - Missing store reported at open
 * - Malformed files rejected
 * - File persistence across instances
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isWalletError } from "@tanglekit/types";
import type { WalletErrorCode } from "@tanglekit/types";
import { SecretStore } from "../src/secret-store.js";
import { FileSecretStoreBackend, InMemorySecretStoreBackend } from "../src/secret-store-backend.js";
import type { SecretStoreBackend } from "../src/secret-store-backend.js";
import { decryptSeed } from "../src/kdf.js";

const ITERATIONS = 1_000;
const SEED = new Uint8Array(32).fill(7);

async function expectCode(promise: Promise<unknown>, code: WalletErrorCode): Promise<void> {
  await expect(promise).rejects.toSatisfy((err: unknown) => isWalletError(err, code));
}

// =============================================================================
// Shared suite
// =============================================================================

function runSharedTests(createBackend: () => SecretStoreBackend) {
  it("stores an encrypted seed that the passphrase recovers", async () => {
    const backend = createBackend();
    const store = await SecretStore.create(backend, "test-secret", { seed: SEED, iterations: ITERATIONS });

    expect(store.iterations).toBe(ITERATIONS);
    expect(store.snapshot.kdf).toBe("pbkdf2-sha256");
    expect(store.snapshot.ciphertext).not.toContain("0707070707");
    expect(await decryptSeed(SecretStore.open(backend).snapshot, "test-secret")).toEqual(SEED);
  });

  it("refuses to replace an existing store", async () => {
    const backend = createBackend();
    await SecretStore.create(backend, "test-secret", { seed: SEED, iterations: ITERATIONS });
    await expect(SecretStore.create(backend, "other", { iterations: ITERATIONS })).rejects.toThrow("already exists");
  });

  it("reports a missing store at open", () => {
    try {
      SecretStore.open(createBackend());
      expect.fail("expected STORE_NOT_FOUND");
    } catch (err: unknown) {
      expect(isWalletError(err, "STORE_NOT_FOUND")).toBe(true);
    }
  });

  it("changes the passphrase", async () => {
    const backend = createBackend();
    const store = await SecretStore.create(backend, "test-secret", { seed: SEED, iterations: ITERATIONS });
    const before = store.snapshot;

    await store.changePassphrase("test-secret", "test-secret-2");

    expect(store.snapshot.salt).not.toBe(before.salt);
    const reopened = SecretStore.open(backend);
    expect(await decryptSeed(reopened.snapshot, "test-secret-2")).toEqual(SEED);
    await expectCode(decryptSeed(reopened.snapshot, "test-secret"), "WRONG_PASSPHRASE");
  });

  it("keeps the old passphrase when the current one is wrong", async () => {
    const backend = createBackend();
    const store = await SecretStore.create(backend, "test-secret", { seed: SEED, iterations: ITERATIONS });
    await expectCode(store.changePassphrase("nope", "test-secret-2"), "WRONG_PASSPHRASE");
    expect(await decryptSeed(SecretStore.open(backend).snapshot, "test-secret")).toEqual(SEED);
  });
}

describe("InMemorySecretStoreBackend", () => {
  runSharedTests(() => new InMemorySecretStoreBackend());
});

describe("FileSecretStoreBackend", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tanglekit-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  runSharedTests(() => new FileSecretStoreBackend(join(dir, "nested", "wallet.json")));

  it("persists across backend instances without leaving a temp file", async () => {
    const path = join(dir, "wallet.json");
    await SecretStore.create(new FileSecretStoreBackend(path), "test-secret", { seed: SEED, iterations: ITERATIONS });

    expect(existsSync(`${path}.tmp`)).toBe(false);
    const reopened = SecretStore.open(new FileSecretStoreBackend(path));
    expect(await decryptSeed(reopened.snapshot, "test-secret")).toEqual(SEED);
  });

  it("rejects a file that is not JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "not json");
    expect(() => new FileSecretStoreBackend(path).read()).toThrow("is not valid JSON");
  });

  it("rejects a file that is not a snapshot", () => {
    const path = join(dir, "other.json");
    writeFileSync(path, JSON.stringify({ version: 2 }));
    expect(() => new FileSecretStoreBackend(path).read()).toThrow("Secret store snapshot is malformed");
  });
});
