/**
 * @tanglekit/transactions — Inclusion confirmation.
 *
 * Polls the node for a submitted block until the ledger decides it.
 *
 *   submitted ──confirmed──▶ confirmed
 *             ──conflicting──▶ conflicting
 *             ──attempts or wait exhausted──▶ timedOut
 *             ──signal aborted──▶ cancelled
 *
 * Rules:
 * - pending and notFound keep polling
 * - A failed status request counts as a pending attempt and is logged
 * - poll() never throws; awaitInclusion turns outcomes into account updates
 */

import { NOOP_LOGGER, WalletError } from "@tanglekit/types";
import type { InclusionReference, InclusionStatus, Logger, SubmissionHandle } from "@tanglekit/types";
import type { Account } from "@tanglekit/account";
import type { NetworkClient } from "./node-client.js";

export type Backoff = "fixed" | "exponential";

export interface InclusionPollOptions {
  /** Delay before the second poll. Default: 1000 */
  readonly intervalMs?: number;
  /** Default: "exponential" */
  readonly backoff?: Backoff;
  /** Cap on a single delay. Default: 30000 */
  readonly maxIntervalMs?: number;
  /** Status requests before giving up. Default: 40 */
  readonly maxAttempts?: number;
  /** Total time before giving up. Default: 300000 */
  readonly maxWaitMs?: number;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly now?: () => number;
  readonly logger?: Logger;
}

export type InclusionOutcome =
  | { readonly kind: "confirmed"; readonly reference: InclusionReference; readonly attempts: number }
  | { readonly kind: "conflicting"; readonly reason?: number | undefined; readonly attempts: number }
  | { readonly kind: "timedOut"; readonly attempts: number }
  | { readonly kind: "cancelled"; readonly attempts: number };

export type PollerState = "submitted" | InclusionOutcome["kind"];

export const DEFAULT_POLL_OPTIONS = {
  intervalMs: 1000,
  backoff: "exponential",
  maxIntervalMs: 30000,
  maxAttempts: 40,
  maxWaitMs: 300000,
} as const satisfies InclusionPollOptions;

/** setTimeout that resolves early when `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class InclusionPoller {
  private readonly _client: NetworkClient;
  private readonly _handle: SubmissionHandle;
  private readonly _intervalMs: number;
  private readonly _backoff: Backoff;
  private readonly _maxIntervalMs: number;
  private readonly _maxAttempts: number;
  private readonly _maxWaitMs: number;
  private readonly _signal: AbortSignal | undefined;
  private readonly _sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly _now: () => number;
  private readonly _logger: Logger;

  private _state: PollerState = "submitted";
  private _run: Promise<InclusionOutcome> | undefined;

  constructor(client: NetworkClient, handle: SubmissionHandle, options: InclusionPollOptions = {}) {
    this._client = client;
    this._handle = handle;
    this._intervalMs = options.intervalMs ?? DEFAULT_POLL_OPTIONS.intervalMs;
    this._backoff = options.backoff ?? DEFAULT_POLL_OPTIONS.backoff;
    this._maxIntervalMs = options.maxIntervalMs ?? DEFAULT_POLL_OPTIONS.maxIntervalMs;
    this._maxAttempts = options.maxAttempts ?? DEFAULT_POLL_OPTIONS.maxAttempts;
    this._maxWaitMs = options.maxWaitMs ?? DEFAULT_POLL_OPTIONS.maxWaitMs;
    this._signal = options.signal;
    this._sleep = options.sleep ?? abortableSleep;
    this._now = options.now ?? Date.now;
    this._logger = (options.logger ?? NOOP_LOGGER).child({ blockId: handle.blockId });
  }

  get state(): PollerState {
    return this._state;
  }

  /** Delay after the given zero-based attempt. */
  delayAfter(attempt: number): number {
    const base = this._backoff === "fixed" ? this._intervalMs : this._intervalMs * Math.pow(2, attempt);
    return Math.min(base, this._maxIntervalMs);
  }

  /** Poll until an outcome. Repeated calls share one run. */
  poll(): Promise<InclusionOutcome> {
    this._run ??= this.run().then((outcome) => {
      this._state = outcome.kind;
      return outcome;
    });
    return this._run;
  }

  private async run(): Promise<InclusionOutcome> {
    const start = this._now();
    let attempts = 0;

    while (attempts < this._maxAttempts) {
      if (this._signal?.aborted === true) {
        return { kind: "cancelled", attempts };
      }

      attempts++;
      const status = await this.fetchStatus(attempts);
      if (status.kind === "confirmed") {
        return { kind: "confirmed", reference: status.reference, attempts };
      }
      if (status.kind === "conflicting") {
        return { kind: "conflicting", reason: status.reason, attempts };
      }
      if (this._signal?.aborted) {
        return { kind: "cancelled", attempts };
      }

      const elapsed = this._now() - start;
      if (attempts >= this._maxAttempts || elapsed >= this._maxWaitMs) break;
      await this._sleep(Math.min(this.delayAfter(attempts - 1), this._maxWaitMs - elapsed), this._signal);
    }

    if (this._signal?.aborted === true) {
      return { kind: "cancelled", attempts };
    }
    return { kind: "timedOut", attempts };
  }

  private async fetchStatus(attempt: number): Promise<InclusionStatus> {
    try {
      const status = await this._client.getStatus(this._handle, this._signal);
      this._logger.debug({ attempt, status: status.kind }, "Inclusion status");
      return status;
    } catch (err: unknown) {
      if (this._signal?.aborted === true) {
        return { kind: "pending" };
      }
      this._logger.warn(
        { attempt, error: err instanceof Error ? err.message : String(err) },
        "Inclusion status request failed",
      );
      return { kind: "pending" };
    }
  }
}

/**
 * Wait for a submitted transaction and settle the account.
 *
 * confirmed: the inputs leave the unspent set.
 * conflicting: the inputs become spendable again.
 * timedOut or cancelled: the pending marks stay; poll again or re-sync.
 *
 * @throws WalletError CONFLICTING_TRANSACTION, TIMEOUT or CANCELLED
 */
export async function awaitInclusion(
  account: Account,
  handle: SubmissionHandle,
  client: NetworkClient,
  options: InclusionPollOptions = {},
): Promise<InclusionReference> {
  const outcome = await new InclusionPoller(client, handle, options).poll();

  switch (outcome.kind) {
    case "confirmed":
      await account.settleConfirmed(handle);
      return outcome.reference;
    case "conflicting":
      await account.settleConflicting(handle);
      throw new WalletError(
        "CONFLICTING_TRANSACTION",
        `Transaction ${handle.transactionId} conflicts` +
          (outcome.reason !== undefined ? ` (reason ${String(outcome.reason)})` : ""),
      );
    case "timedOut":
      throw new WalletError(
        "TIMEOUT",
        `Transaction ${handle.transactionId} not included after ${String(outcome.attempts)} status checks`,
      );
    case "cancelled":
      throw new WalletError("CANCELLED", `Waiting for transaction ${handle.transactionId} was cancelled`);
  }
}
