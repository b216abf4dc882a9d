/**
 * @tanglekit/transactions — Input selection, essence, signing, submission
 * and inclusion tracking.
 */

export { isSelectable, selectInputs } from "./input-selection.js";
export type { SelectionRequest, InputSelection } from "./input-selection.js";

export {
  OUTPUT_ID_LENGTH,
  networkIdFromName,
  buildOutputId,
  outputIdToInput,
  inputsCommitment,
  serializeEssence,
  essenceHash,
  serializeTransactionPayload,
  transactionIdOf,
  createEssence,
  createPayload,
} from "./essence.js";

export {
  MAX_INPUTS,
  MAX_OUTPUTS,
  prepareTransaction,
  requiredSigners,
  signTransaction,
  checkBalanced,
} from "./transaction-builder.js";
export type { PreparedTransaction } from "./transaction-builder.js";

export { buildAndSubmit } from "./submitter.js";
export type { SubmitOptions } from "./submitter.js";

export { DEFAULT_RETRY_CONFIG, computeDelay, isRetryableNetworkError, retrySubmission } from "./retry.js";
export type { RetryConfig, RetryFailure, RetryHooks } from "./retry.js";

export { HttpNodeClient, PROTOCOL_VERSION, transactionPayloadToJson } from "./node-client.js";
export type {
  NetworkClient,
  FetchFn,
  HttpNodeClientConfig,
  TransactionPayloadJson,
  UnlockJson,
} from "./node-client.js";

export { InclusionPoller, awaitInclusion, abortableSleep, DEFAULT_POLL_OPTIONS } from "./confirmation.js";
export type { Backoff, InclusionPollOptions, InclusionOutcome, PollerState } from "./confirmation.js";
