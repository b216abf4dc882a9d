/**
 * Error Taxonomy
 *
 * Every failure in the engine is a WalletError with a stable code.
 * Subclasses carry the context a caller needs to react (which constraint,
 * which asset, which addresses).
 *
 * Retry semantics by code:
 * - INVALID_OUTPUT, INSUFFICIENT_FUNDS: local, never retried
 * - OVERFLOW, INCOMPLETE_SIGNATURES: invariant violations, abort
 * - WRONG_PASSPHRASE, SIGNER_LOCKED: re-authenticate
 * - NETWORK_ERROR: transient, the whole submit may be retried
 * - REJECTED: not retried with the same inputs
 * - CONFLICTING_TRANSACTION: inputs must be re-selected
 * - TIMEOUT: ambiguous, re-poll rather than re-submit
 */

import type { HexString } from "./address.js";

export type WalletErrorCode =
  | "INVALID_OUTPUT"
  | "INSUFFICIENT_FUNDS"
  | "OVERFLOW"
  | "WRONG_PASSPHRASE"
  | "SIGNER_LOCKED"
  | "INCOMPLETE_SIGNATURES"
  | "NETWORK_ERROR"
  | "REJECTED"
  | "CONFLICTING_TRANSACTION"
  | "TIMEOUT"
  | "CANCELLED"
  | "INVALID_ENCODING"
  | "INVALID_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "STORE_NOT_FOUND";

export class WalletError extends Error {
  public readonly code: WalletErrorCode;

  constructor(code: WalletErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WalletError";
    this.code = code;
  }
}

/** Output construction constraints, reported by InvalidOutputError. */
export type OutputConstraint =
  | "unlock-condition-not-allowed"
  | "feature-not-allowed"
  | "immutable-feature-not-allowed"
  | "missing-unlock-condition"
  | "duplicate-unlock-condition"
  | "duplicate-feature"
  | "duplicate-native-token"
  | "too-many-native-tokens"
  | "native-token-id"
  | "native-token-amount"
  | "metadata-length"
  | "tag-length"
  | "state-metadata-length"
  | "unix-time"
  | "alias-address-required"
  | "storage-deposit-return"
  | "token-scheme"
  | "encoding"
  | "amount-range"
  | "storage-deposit";

export class InvalidOutputError extends WalletError {
  public readonly constraint: OutputConstraint;

  constructor(constraint: OutputConstraint, message: string) {
    super("INVALID_OUTPUT", message);
    this.name = "InvalidOutputError";
    this.constraint = constraint;
  }
}

export class InsufficientFundsError extends WalletError {
  /** "base" for the base amount, otherwise the native token id. */
  public readonly asset: "base" | HexString;
  public readonly required: bigint;
  public readonly available: bigint;

  constructor(asset: "base" | HexString, required: bigint, available: bigint) {
    super(
      "INSUFFICIENT_FUNDS",
      `Insufficient funds for ${asset === "base" ? "base amount" : `native token ${asset}`}: ` +
        `required ${required.toString()}, available ${available.toString()}`,
    );
    this.name = "InsufficientFundsError";
    this.asset = asset;
    this.required = required;
    this.available = available;
  }
}

export class OverflowError extends WalletError {
  constructor(message: string) {
    super("OVERFLOW", message);
    this.name = "OverflowError";
  }
}

export class IncompleteSignaturesError extends WalletError {
  /** Addresses (hex keys) for which no signature was produced. */
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(
      "INCOMPLETE_SIGNATURES",
      `Missing signatures for ${String(missing.length)} address(es): ${missing.join(", ")}`,
    );
    this.name = "IncompleteSignaturesError";
    this.missing = missing;
  }
}

export class NetworkError extends WalletError {
  /** True when the request hit its network-level timeout. */
  public readonly timedOut: boolean;
  /** HTTP status, 0 when the request never produced a response. */
  public readonly status: number;

  constructor(message: string, options: { timedOut?: boolean; status?: number; cause?: unknown } = {}) {
    super("NETWORK_ERROR", message, { cause: options.cause });
    this.name = "NetworkError";
    this.timedOut = options.timedOut ?? false;
    this.status = options.status ?? 0;
  }
}
