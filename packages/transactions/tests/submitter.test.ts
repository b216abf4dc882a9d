/**
 * Tests for buildAndSubmit: reservation, signing, submission and release.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import { IncompleteSignaturesError, InsufficientFundsError, NetworkError, WalletError } from "@tanglekit/types";
import { Account } from "@tanglekit/account";
import type { AccountAddress } from "@tanglekit/account";
import type { SignerSession } from "@tanglekit/signer";
import { buildAndSubmit } from "../src/submitter.js";
import type { RetryConfig } from "../src/retry.js";
import { COIN, FakeNetworkClient, PARAMS, foreignOwner, outputId, record, toRecipient, unlockSession } from "./fixtures.js";

const RETRY: RetryConfig = { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitterMs: 0 };
const noopSleep = async (_ms: number): Promise<void> => {};

let session: SignerSession;
let owner: AccountAddress;
let account: Account;
let client: FakeNetworkClient;

beforeAll(async () => {
  const unlocked = await unlockSession(1);
  session = unlocked.session;
  const [a] = unlocked.addresses;
  if (a === undefined) throw new Error("expected an address");
  owner = a;
});

afterAll(() => {
  session.release();
});

beforeEach(async () => {
  account = new Account({ alias: "alice", index: 0, coinType: COIN, protocol: PARAMS, addresses: [owner] });
  await account.applySync([record(1, 300_000n, owner), record(2, 300_000n, owner)]);
  client = new FakeNetworkClient();
});

describe("buildAndSubmit", () => {
  it("submits and marks the inputs pending", async () => {
    const handle = await buildAndSubmit(account, [toRecipient(250_000n)], session, { client });

    expect(client.submitTransaction).toHaveBeenCalledTimes(1);
    expect(handle.transactionId).toBe(client.submitted[0]?.transactionId);
    expect(account.isPending(outputId(1))).toBe(true);
    expect(account.spendable().map((r) => r.outputId)).toEqual([outputId(2)]);
    expect(account.pendingTransactions()).toEqual([handle]);
  });

  it("never reaches the network without funds", async () => {
    await expect(buildAndSubmit(account, [toRecipient(700_000n)], session, { client })).rejects.toBeInstanceOf(
      InsufficientFundsError,
    );
    expect(client.submitTransaction).not.toHaveBeenCalled();
    expect(account.spendable()).toHaveLength(2);
  });

  it("gives concurrent builds disjoint inputs", async () => {
    const [a, b] = await Promise.all([
      buildAndSubmit(account, [toRecipient(250_000n)], session, { client }),
      buildAndSubmit(account, [toRecipient(250_000n)], session, { client }),
    ]);

    expect(a.transactionId).not.toBe(b.transactionId);
    expect(client.submitted.flatMap((s) => s.inputIds).sort()).toEqual([outputId(1), outputId(2)]);
    expect(account.spendable()).toEqual([]);
  });

  it("releases the reservation when the node rejects", async () => {
    client.submitTransaction.mockRejectedValueOnce(new WalletError("REJECTED", "Node rejected request"));

    await expect(buildAndSubmit(account, [toRecipient(250_000n)], session, { client })).rejects.toThrow(
      "Node rejected request",
    );
    expect(account.spendable()).toHaveLength(2);
    expect(account.isReserved(outputId(1))).toBe(false);
  });

  it("does not submit when a signature is missing", async () => {
    await account.applySync([record(3, 300_000n, foreignOwner())]);

    await expect(buildAndSubmit(account, [toRecipient(250_000n)], session, { client })).rejects.toBeInstanceOf(
      IncompleteSignaturesError,
    );
    expect(client.submitTransaction).not.toHaveBeenCalled();
    expect(account.spendable()).toHaveLength(1);
  });

  it("retries transient network errors", async () => {
    client.submitTransaction
      .mockRejectedValueOnce(new NetworkError("connection reset"))
      .mockRejectedValueOnce(new NetworkError("connection reset"));

    const handle = await buildAndSubmit(account, [toRecipient(250_000n)], session, {
      client,
      retry: RETRY,
      sleep: noopSleep,
    });

    expect(client.submitTransaction).toHaveBeenCalledTimes(3);
    expect(account.pendingTransactions()).toEqual([handle]);
  });

  it("surfaces the last network error once retries run out", async () => {
    client.submitTransaction.mockRejectedValue(new NetworkError("connection reset"));

    await expect(
      buildAndSubmit(account, [toRecipient(250_000n)], session, { client, retry: RETRY, sleep: noopSleep }),
    ).rejects.toBeInstanceOf(NetworkError);
    expect(client.submitTransaction).toHaveBeenCalledTimes(3);
    expect(account.spendable()).toHaveLength(2);
  });

  it("does not retry a submission that timed out", async () => {
    client.submitTransaction.mockRejectedValue(new NetworkError("timed out", { timedOut: true }));

    await expect(
      buildAndSubmit(account, [toRecipient(250_000n)], session, { client, retry: RETRY, sleep: noopSleep }),
    ).rejects.toThrow("timed out");
    expect(client.submitTransaction).toHaveBeenCalledTimes(1);
  });

  it("logs each resend", async () => {
    client.submitTransaction.mockRejectedValueOnce(new NetworkError("Node error", { status: 503 }));
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: vi.fn() };
    logger.child.mockReturnValue(logger);

    await buildAndSubmit(account, [toRecipient(250_000n)], session, { client, logger, retry: RETRY, sleep: noopSleep });

    expect(warn).toHaveBeenCalledWith(
      { attempt: 1, delayMs: 10, status: 503, error: "Node error" },
      "Submission failed; resending",
    );
  });

  it("logs with the account alias", async () => {
    const info = vi.fn();
    const logger = {
      debug: vi.fn(),
      info,
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    logger.child.mockReturnValue(logger);

    const handle = await buildAndSubmit(account, [toRecipient(250_000n)], session, { client, logger });

    expect(logger.child).toHaveBeenCalledWith({ account: "alice" });
    expect(info).toHaveBeenCalledWith(
      { transactionId: handle.transactionId, blockId: handle.blockId },
      "Transaction submitted",
    );
  });
});
