/**
 * @tanglekit/signer — Secure signer.
 *
 * A passphrase-encrypted seed store and the sessions that sign with it.
 * Only public keys and signatures ever leave this package.
 */

export { SecureSigner, SignerSession, signatureKey } from "./signer.js";
export type { AddressRange, GeneratedAddress, RequiredAddress, UnlockOptions } from "./signer.js";

export { SecretStore } from "./secret-store.js";
export type { CreateSecretStoreOptions } from "./secret-store.js";

export { InMemorySecretStoreBackend, FileSecretStoreBackend } from "./secret-store-backend.js";
export type { SecretStoreBackend } from "./secret-store-backend.js";

export { DEFAULT_KDF_ITERATIONS, SecretSnapshotSchema, parseSnapshot } from "./kdf.js";
export type { SecretSnapshot } from "./kdf.js";

export { formatPath } from "./slip10.js";
