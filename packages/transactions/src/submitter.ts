/**
 * @tanglekit/transactions — Build and submit.
 *
 * Rules:
 * - Selection and reservation happen in one account critical section
 * - Signing and network I/O run outside the lock
 * - Any failure after reservation releases it; success marks the inputs
 *   pending under the returned handle
 * - Nothing reaches the network unless every input is unlocked
 */

import { NOOP_LOGGER, isWalletError } from "@tanglekit/types";
import type { Logger, Output, SignedTransaction, SubmissionHandle } from "@tanglekit/types";
import type { Account } from "@tanglekit/account";
import type { SignerSession } from "@tanglekit/signer";
import type { NetworkClient } from "./node-client.js";
import { prepareTransaction, signTransaction } from "./transaction-builder.js";
import { retrySubmission } from "./retry.js";
import type { RetryConfig } from "./retry.js";

export interface SubmitOptions {
  readonly client: NetworkClient;
  readonly logger?: Logger;
  /** Retry transient submission failures. Omitted: one attempt. */
  readonly retry?: RetryConfig;
  readonly sleep?: (ms: number) => Promise<void>;
}

function submit(signed: SignedTransaction, options: SubmitOptions, logger: Logger): Promise<SubmissionHandle> {
  const send = (): Promise<SubmissionHandle> => options.client.submitTransaction(signed);
  if (options.retry === undefined) {
    return send();
  }
  return retrySubmission(send, options.retry, {
    sleep: options.sleep,
    onRetry: ({ attempt, delayMs, error }) =>
      logger.warn({ attempt, delayMs, status: error.status, error: error.message }, "Submission failed; resending"),
  });
}

/**
 * Fund `targets` from the account, sign and submit the transaction.
 *
 * @throws InsufficientFundsError before any network contact
 * @throws IncompleteSignaturesError when the session cannot unlock every input
 * @throws NetworkError or WalletError REJECTED from submission
 */
export async function buildAndSubmit(
  account: Account,
  targets: readonly Output[],
  session: SignerSession,
  options: SubmitOptions,
): Promise<SubmissionHandle> {
  const logger = (options.logger ?? NOOP_LOGGER).child({ account: account.alias });

  const { prepared, reservation } = await account.withLock((locked) => {
    const prepared = prepareTransaction({
      candidates: locked.spendable(),
      targets,
      protocol: account.protocol,
      remainderAddress: account.remainderAddress().address,
    });
    return { prepared, reservation: locked.reserve(prepared.inputIds) };
  });
  logger.debug(
    { inputs: prepared.inputIds.length, outputs: prepared.essence.outputs.length },
    "Inputs reserved",
  );

  try {
    const signed = await signTransaction(prepared, session);
    const handle = await submit(signed, options, logger);
    await account.markPending(reservation, handle);
    logger.info({ transactionId: handle.transactionId, blockId: handle.blockId }, "Transaction submitted");
    return handle;
  } catch (err: unknown) {
    await account.release(reservation);
    logger.warn(
      { code: isWalletError(err) ? err.code : undefined, inputs: prepared.inputIds },
      "Submission failed; inputs released",
    );
    throw err;
  }
}
