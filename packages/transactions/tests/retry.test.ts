/**
 * Tests for submission retry with exponential backoff.
 */

import { describe, it, expect, vi } from "vitest";
import { NetworkError, WalletError } from "@tanglekit/types";
import { computeDelay, isRetryableNetworkError, retrySubmission } from "../src/retry.js";
import type { RetryConfig, RetryFailure } from "../src/retry.js";

const fastConfig: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
};

const noopSleep = async (_ms: number) => {};

describe("retrySubmission", () => {
  it("returns result on first success", async () => {
    const send = vi.fn().mockResolvedValue("ok");
    await expect(retrySubmission(send, fastConfig, { sleep: noopSleep })).resolves.toBe("ok");
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("resends after transport failures", async () => {
    const send = vi.fn()
      .mockRejectedValueOnce(new NetworkError("connection reset"))
      .mockRejectedValueOnce(new NetworkError("Node error", { status: 503 }))
      .mockResolvedValueOnce("recovered");

    await expect(retrySubmission(send, fastConfig, { sleep: noopSleep })).resolves.toBe("recovered");
    expect(send).toHaveBeenCalledTimes(3);
  });

  it("rethrows the last network error once attempts run out", async () => {
    const last = new NetworkError("connection reset");
    const send = vi.fn()
      .mockRejectedValueOnce(new NetworkError("first"))
      .mockRejectedValueOnce(new NetworkError("second"))
      .mockRejectedValueOnce(last);

    await expect(retrySubmission(send, fastConfig, { sleep: noopSleep })).rejects.toBe(last);
    expect(send).toHaveBeenCalledTimes(3);
  });

  it("does not resend rejections, timeouts or foreign errors", async () => {
    for (const err of [
      new WalletError("REJECTED", "bad block"),
      new NetworkError("timed out", { timedOut: true }),
      new Error("boom"),
    ]) {
      const send = vi.fn().mockRejectedValue(err);
      await expect(retrySubmission(send, fastConfig, { sleep: noopSleep })).rejects.toBe(err);
      expect(send).toHaveBeenCalledTimes(1);
    }
  });

  it("waits with capped exponential delays and reports each resend", async () => {
    const delays: number[] = [];
    const failures: RetryFailure[] = [];
    const error = new NetworkError("connection reset");
    const send = vi.fn().mockRejectedValue(error);

    await expect(
      retrySubmission(send, { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitterMs: 0 }, {
        sleep: async (ms) => {
          delays.push(ms);
        },
        onRetry: (failure) => failures.push(failure),
      }),
    ).rejects.toBe(error);

    expect(delays).toEqual([100, 200, 300, 300]);
    expect(failures.map((f) => [f.attempt, f.delayMs])).toEqual([
      [1, 100],
      [2, 200],
      [3, 300],
      [4, 300],
    ]);
    expect(failures[0]?.error).toBe(error);
  });
});

describe("computeDelay", () => {
  it("computes exponential backoff", () => {
    const config: RetryConfig = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10000, jitterMs: 0 };
    expect(computeDelay(0, config)).toBe(100);
    expect(computeDelay(1, config)).toBe(200);
    expect(computeDelay(2, config)).toBe(400);
  });

  it("keeps jitter within its bound", () => {
    const config: RetryConfig = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10000, jitterMs: 50 };
    const delay = computeDelay(0, config);
    expect(delay).toBeGreaterThanOrEqual(100);
    expect(delay).toBeLessThan(150);
  });
});

describe("isRetryableNetworkError", () => {
  it("retries transport failures", () => {
    expect(isRetryableNetworkError(new NetworkError("connection reset"))).toBe(true);
    expect(isRetryableNetworkError(new NetworkError("HTTP 503", { status: 503 }))).toBe(true);
    expect(isRetryableNetworkError(new NetworkError("HTTP 429", { status: 429 }))).toBe(true);
  });

  it("does not retry timeouts, rejections or foreign errors", () => {
    expect(isRetryableNetworkError(new NetworkError("timed out", { timedOut: true }))).toBe(false);
    expect(isRetryableNetworkError(new WalletError("REJECTED", "bad block"))).toBe(false);
    expect(isRetryableNetworkError(new Error("boom"))).toBe(false);
  });
});
