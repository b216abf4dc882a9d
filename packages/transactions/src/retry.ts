/**
 * @tanglekit/transactions — Submission retry.
 *
 * Rules:
 * - Only transport failures are resent; a node answer (REJECTED) is final
 * - A request that timed out is never resent, it may have reached the node
 * - When attempts run out, the last NetworkError propagates unchanged
 *
 * Backoff: min(baseDelayMs * 2^retry + random(0, jitterMs), maxDelayMs)
 */

import { NetworkError } from "@tanglekit/types";
import { abortableSleep } from "./confirmation.js";

export interface RetryConfig {
  /** Attempts including the first send. Default: 3 */
  readonly maxAttempts: number;
  /** Default: 1000 */
  readonly baseDelayMs: number;
  /** Default: 30000 */
  readonly maxDelayMs: number;
  /** Default: 200 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

export interface RetryFailure {
  /** One-based attempt that failed. */
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: NetworkError;
}

export interface RetryHooks {
  readonly sleep?: (ms: number) => Promise<void>;
  /** Called before each wait, once per resend. */
  readonly onRetry?: (failure: RetryFailure) => void;
}

/** Delay before the given zero-based resend. */
export function computeDelay(retry: number, config: RetryConfig): number {
  const jitter = Math.random() * config.jitterMs;
  return Math.min(config.baseDelayMs * Math.pow(2, retry) + jitter, config.maxDelayMs);
}

export function isRetryableNetworkError(err: unknown): err is NetworkError {
  return err instanceof NetworkError && !err.timedOut;
}

/**
 * Send until it succeeds, fails with something other than a retryable
 * NetworkError, or `config.maxAttempts` sends have failed.
 */
export async function retrySubmission<T>(
  send: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? abortableSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await send();
    } catch (err: unknown) {
      if (!isRetryableNetworkError(err) || attempt >= config.maxAttempts) {
        throw err;
      }
      const delayMs = computeDelay(attempt - 1, config);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}
