/**
 * Output Types
 *
 * The unit of ledger value and everything attached to it: native token
 * balances, unlock conditions and features. Unlock conditions and features
 * are closed tagged unions; the `type` discriminant doubles as the wire kind
 * and as the canonical sort key within an output.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint (u64 base amount, u256 native token amounts)
 * - Byte payloads are 0x-prefixed hex
 */

import type { Address, AliasAddress, HexString } from "./address.js";

// =============================================================================
// Native tokens
// =============================================================================

/** A native token balance: 38-byte token (foundry) id plus u256 amount. */
export interface NativeToken {
  readonly id: HexString;
  readonly amount: bigint;
}

// =============================================================================
// Unlock conditions
// =============================================================================

export const UNLOCK_CONDITION_TYPE = {
  ADDRESS: 0,
  STORAGE_DEPOSIT_RETURN: 1,
  TIMELOCK: 2,
  EXPIRATION: 3,
  STATE_CONTROLLER_ADDRESS: 4,
  GOVERNOR_ADDRESS: 5,
  IMMUTABLE_ALIAS_ADDRESS: 6,
} as const;

export type UnlockConditionType =
  (typeof UNLOCK_CONDITION_TYPE)[keyof typeof UNLOCK_CONDITION_TYPE];

export interface AddressUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.ADDRESS;
  readonly address: Address;
}

export interface StorageDepositReturnUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN;
  readonly returnAddress: Address;
  readonly amount: bigint;
}

export interface TimelockUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.TIMELOCK;
  /** Unix seconds before which the output cannot be unlocked. */
  readonly unixTime: number;
}

export interface ExpirationUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.EXPIRATION;
  readonly returnAddress: Address;
  /** Unix seconds after which only the return address can unlock. */
  readonly unixTime: number;
}

export interface StateControllerAddressUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.STATE_CONTROLLER_ADDRESS;
  readonly address: Address;
}

export interface GovernorAddressUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.GOVERNOR_ADDRESS;
  readonly address: Address;
}

export interface ImmutableAliasAddressUnlockCondition {
  readonly type: typeof UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS;
  readonly address: AliasAddress;
}

export type UnlockCondition =
  | AddressUnlockCondition
  | StorageDepositReturnUnlockCondition
  | TimelockUnlockCondition
  | ExpirationUnlockCondition
  | StateControllerAddressUnlockCondition
  | GovernorAddressUnlockCondition
  | ImmutableAliasAddressUnlockCondition;

// =============================================================================
// Features
// =============================================================================

export const FEATURE_TYPE = {
  SENDER: 0,
  ISSUER: 1,
  METADATA: 2,
  TAG: 3,
} as const;

export type FeatureType = (typeof FEATURE_TYPE)[keyof typeof FEATURE_TYPE];

export interface SenderFeature {
  readonly type: typeof FEATURE_TYPE.SENDER;
  readonly address: Address;
}

export interface IssuerFeature {
  readonly type: typeof FEATURE_TYPE.ISSUER;
  readonly address: Address;
}

export interface MetadataFeature {
  readonly type: typeof FEATURE_TYPE.METADATA;
  readonly data: HexString;
}

export interface TagFeature {
  readonly type: typeof FEATURE_TYPE.TAG;
  readonly tag: HexString;
}

export type Feature = SenderFeature | IssuerFeature | MetadataFeature | TagFeature;

// =============================================================================
// Outputs
// =============================================================================

export const OUTPUT_TYPE = {
  BASIC: 3,
  ALIAS: 4,
  FOUNDRY: 5,
  NFT: 6,
} as const;

export type OutputType = (typeof OUTPUT_TYPE)[keyof typeof OUTPUT_TYPE];

/** Fields shared by every output kind. */
interface CommonOutput {
  readonly amount: bigint;
  readonly nativeTokens: readonly NativeToken[];
  readonly unlockConditions: readonly UnlockCondition[];
  readonly features: readonly Feature[];
}

export interface BasicOutput extends CommonOutput {
  readonly type: typeof OUTPUT_TYPE.BASIC;
}

export interface AliasOutput extends CommonOutput {
  readonly type: typeof OUTPUT_TYPE.ALIAS;
  /** All zeroes for an alias being created. */
  readonly aliasId: HexString;
  readonly stateIndex: number;
  readonly stateMetadata: HexString;
  readonly foundryCounter: number;
  readonly immutableFeatures: readonly Feature[];
}

export const TOKEN_SCHEME_TYPE = {
  SIMPLE: 0,
} as const;

export interface SimpleTokenScheme {
  readonly type: typeof TOKEN_SCHEME_TYPE.SIMPLE;
  readonly mintedTokens: bigint;
  readonly meltedTokens: bigint;
  readonly maximumSupply: bigint;
}

export type TokenScheme = SimpleTokenScheme;

export interface FoundryOutput extends CommonOutput {
  readonly type: typeof OUTPUT_TYPE.FOUNDRY;
  readonly serialNumber: number;
  readonly tokenScheme: TokenScheme;
  readonly immutableFeatures: readonly Feature[];
}

export interface NftOutput extends CommonOutput {
  readonly type: typeof OUTPUT_TYPE.NFT;
  /** All zeroes for an NFT being minted. */
  readonly nftId: HexString;
  readonly immutableFeatures: readonly Feature[];
}

export type Output = BasicOutput | AliasOutput | FoundryOutput | NftOutput;

/** Output kinds that carry immutable features. */
export type OutputWithImmutableFeatures = AliasOutput | FoundryOutput | NftOutput;

// =============================================================================
// Ledger references
// =============================================================================

/** Transaction id (32 bytes) followed by the u16 LE output index, hex encoded. */
export type OutputId = HexString;

/** An output as the node reports it, with its id. */
export interface OutputWithId {
  readonly outputId: OutputId;
  readonly output: Output;
}

/** Protocol-defined parameters of the rent (storage deposit) model. */
export interface RentStructure {
  readonly vByteCost: number;
  readonly vByteFactorData: number;
  readonly vByteFactorKey: number;
}
