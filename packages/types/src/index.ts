/**
 * @tanglekit/types — Shared data model for the tanglekit stack.
 *
 * Addresses, outputs, transactions, protocol parameters and the error
 * taxonomy used by every other package.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Closed tagged unions for every polymorphic ledger element
 * - No runtime dependencies
 */

// Addresses
export type {
  HexString,
  AddressType,
  Ed25519Address,
  AliasAddress,
  NftAddress,
  Address,
  Bip44Chain,
} from "./address.js";
export { ADDRESS_TYPE, addressBody, addressKey, addressesEqual } from "./address.js";

// Outputs
export type {
  NativeToken,
  UnlockConditionType,
  AddressUnlockCondition,
  StorageDepositReturnUnlockCondition,
  TimelockUnlockCondition,
  ExpirationUnlockCondition,
  StateControllerAddressUnlockCondition,
  GovernorAddressUnlockCondition,
  ImmutableAliasAddressUnlockCondition,
  UnlockCondition,
  FeatureType,
  SenderFeature,
  IssuerFeature,
  MetadataFeature,
  TagFeature,
  Feature,
  OutputType,
  BasicOutput,
  AliasOutput,
  SimpleTokenScheme,
  TokenScheme,
  FoundryOutput,
  NftOutput,
  Output,
  OutputWithImmutableFeatures,
  OutputId,
  OutputWithId,
  RentStructure,
} from "./output.js";
export {
  UNLOCK_CONDITION_TYPE,
  FEATURE_TYPE,
  OUTPUT_TYPE,
  TOKEN_SCHEME_TYPE,
} from "./output.js";

// Protocol
export type { StorageDepositFn, ProtocolParameters } from "./protocol.js";

// Transactions
export type {
  UtxoInput,
  TransactionEssence,
  Ed25519Signature,
  SignatureUnlock,
  ReferenceUnlock,
  Unlock,
  TransactionPayload,
  SignedTransaction,
  SubmissionHandle,
  InclusionReference,
  InclusionStatus,
} from "./transaction.js";
export {
  INPUT_TYPE_UTXO,
  ESSENCE_TYPE_REGULAR,
  PAYLOAD_TYPE_TRANSACTION,
  SIGNATURE_TYPE_ED25519,
  UNLOCK_TYPE,
} from "./transaction.js";

// Logging
export type { LogMethod, Logger } from "./logger.js";
export { NOOP_LOGGER } from "./logger.js";

// Errors
export type { WalletErrorCode, OutputConstraint } from "./errors.js";
export {
  WalletError,
  InvalidOutputError,
  InsufficientFundsError,
  OverflowError,
  IncompleteSignaturesError,
  NetworkError,
} from "./errors.js";

// Guards
export { isWalletError } from "./guards.js";
