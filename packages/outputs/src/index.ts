/**
 * @tanglekit/outputs — Output model and builder.
 *
 * Builds well-formed canonical outputs, computes the storage deposit they
 * must hold, and moves them between the binary wire format and node JSON.
 */

export {
  ALLOW_LISTS,
  MAX_NATIVE_TOKENS,
  MAX_METADATA_LENGTH,
  MAX_TAG_LENGTH,
  MAX_STATE_METADATA_LENGTH,
} from "./allow-list.js";
export type { OutputAllowList } from "./allow-list.js";

export { sortUnlockConditions, sortFeatures, sortNativeTokens } from "./canonical.js";

export {
  serializeOutput,
  deserializeOutput,
  writeOutput,
  readOutput,
  writeUnlockCondition,
  readUnlockCondition,
  writeFeature,
  readFeature,
} from "./serializer.js";

export {
  storageDepositOffset,
  rentStructureDeposit,
  minimumStorageDeposit,
  minimumBasicOutputDeposit,
} from "./storage-deposit.js";

export {
  buildOutput,
  buildBasicOutput,
  buildAliasOutput,
  buildFoundryOutput,
  buildNftOutput,
  addressUnlockCondition,
  storageDepositReturnUnlockCondition,
  timelockUnlockCondition,
  expirationUnlockCondition,
  senderFeature,
  issuerFeature,
  metadataFeature,
  tagFeature,
} from "./builder.js";
export type {
  AmountSpec,
  OutputSpec,
  BasicOutputSpec,
  AliasOutputSpec,
  FoundryOutputSpec,
  NftOutputSpec,
} from "./builder.js";

export {
  OutputJsonSchema,
  AddressJsonSchema,
  UnlockConditionJsonSchema,
  FeatureJsonSchema,
  outputFromJson,
  outputToJson,
  addressToJson,
} from "./json.js";
export type { OutputJson, AddressJson } from "./json.js";
