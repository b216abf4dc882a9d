/**
 * Output Builder
 *
 * Turns caller-supplied parts into a well-formed, canonical output.
 *
 * Rules:
 * - Every violation is an InvalidOutputError naming the constraint
 * - Canonical order is applied before serialization; caller order never matters
 * - The storage deposit is checked against the serialized canonical form
 * - Nothing is mutated; the result is a fresh value
 */

import {
  ADDRESS_TYPE,
  FEATURE_TYPE,
  InvalidOutputError,
  OUTPUT_TYPE,
  TOKEN_SCHEME_TYPE,
  UNLOCK_CONDITION_TYPE,
  isWalletError,
} from "@tanglekit/types";
import type {
  Address,
  AliasOutput,
  BasicOutput,
  Feature,
  FeatureType,
  FoundryOutput,
  HexString,
  NativeToken,
  NftOutput,
  Output,
  OutputConstraint,
  ProtocolParameters,
  TokenScheme,
  UnlockCondition,
} from "@tanglekit/types";
import {
  ADDRESS_BODY_LENGTH,
  U32_MAX,
  U64_MAX,
  U256_MAX,
  addressFromBytes,
  addressToBytes,
  normalizeHex,
  normalizeTokenId,
} from "@tanglekit/codec";
import {
  ALLOW_LISTS,
  MAX_METADATA_LENGTH,
  MAX_NATIVE_TOKENS,
  MAX_STATE_METADATA_LENGTH,
  MAX_TAG_LENGTH,
} from "./allow-list.js";
import { sortFeatures, sortNativeTokens, sortUnlockConditions } from "./canonical.js";
import { minimumBasicOutputDeposit, minimumStorageDeposit } from "./storage-deposit.js";

// =============================================================================
// Specs
// =============================================================================

/** `"minimum"` sets the amount to exactly the minimum storage deposit. */
export type AmountSpec = bigint | "minimum";

interface CommonOutputSpec {
  readonly amount: AmountSpec;
  readonly nativeTokens?: readonly NativeToken[];
  readonly unlockConditions: readonly UnlockCondition[];
  readonly features?: readonly Feature[];
}

export interface BasicOutputSpec extends CommonOutputSpec {
  readonly type: typeof OUTPUT_TYPE.BASIC;
}

export interface AliasOutputSpec extends CommonOutputSpec {
  readonly type: typeof OUTPUT_TYPE.ALIAS;
  /** Defaults to all zeroes (a new alias). */
  readonly aliasId?: HexString;
  readonly stateIndex?: number;
  readonly stateMetadata?: HexString;
  readonly foundryCounter?: number;
  readonly immutableFeatures?: readonly Feature[];
}

export interface FoundryOutputSpec extends CommonOutputSpec {
  readonly type: typeof OUTPUT_TYPE.FOUNDRY;
  readonly serialNumber: number;
  readonly tokenScheme: TokenScheme;
  readonly immutableFeatures?: readonly Feature[];
}

export interface NftOutputSpec extends CommonOutputSpec {
  readonly type: typeof OUTPUT_TYPE.NFT;
  /** Defaults to all zeroes (an NFT being minted). */
  readonly nftId?: HexString;
  readonly immutableFeatures?: readonly Feature[];
}

export type OutputSpec = BasicOutputSpec | AliasOutputSpec | FoundryOutputSpec | NftOutputSpec;

type WithoutType<T> = Omit<T, "type">;

const ZERO_ID = `0x${"00".repeat(ADDRESS_BODY_LENGTH)}`;

// =============================================================================
// Field validation
// =============================================================================

/** Run a decoder and report its failure as the given output constraint. */
function decodeAs<T>(constraint: OutputConstraint, decode: () => T): T {
  try {
    return decode();
  } catch (err: unknown) {
    if (isWalletError(err, "INVALID_ENCODING")) {
      throw new InvalidOutputError(constraint, err.message);
    }
    throw err;
  }
}

function normalizeAddress(address: Address): Address {
  return decodeAs("encoding", () => addressFromBytes(addressToBytes(address)));
}

function checkU32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new InvalidOutputError("amount-range", `${field} must be a u32, got ${String(value)}`);
  }
}

function checkAmount(amount: bigint, params: ProtocolParameters): void {
  if (amount < 0n || amount > U64_MAX) {
    throw new InvalidOutputError("amount-range", `Amount ${amount.toString()} is outside the u64 range`);
  }
  if (amount > params.tokenSupply) {
    throw new InvalidOutputError(
      "amount-range",
      `Amount ${amount.toString()} exceeds the token supply ${params.tokenSupply.toString()}`,
    );
  }
}

function checkUnixTime(unixTime: number): void {
  if (!Number.isInteger(unixTime) || unixTime <= 0 || unixTime > U32_MAX) {
    throw new InvalidOutputError("unix-time", `Unix time must be a positive u32, got ${String(unixTime)}`);
  }
}

function normalizeNativeTokens(tokens: readonly NativeToken[]): NativeToken[] {
  if (tokens.length > MAX_NATIVE_TOKENS) {
    throw new InvalidOutputError(
      "too-many-native-tokens",
      `At most ${String(MAX_NATIVE_TOKENS)} native tokens per output, got ${String(tokens.length)}`,
    );
  }
  const seen = new Set<HexString>();
  const out: NativeToken[] = [];
  for (const token of tokens) {
    const id = decodeAs("native-token-id", () => normalizeTokenId(token.id));
    if (seen.has(id)) {
      throw new InvalidOutputError("duplicate-native-token", `Native token ${id} appears more than once`);
    }
    seen.add(id);
    if (token.amount <= 0n || token.amount > U256_MAX) {
      throw new InvalidOutputError(
        "native-token-amount",
        `Native token ${id} amount must be in 1..u256 max, got ${token.amount.toString()}`,
      );
    }
    out.push({ id, amount: token.amount });
  }
  return sortNativeTokens(out);
}

function normalizeUnlockCondition(uc: UnlockCondition): UnlockCondition {
  switch (uc.type) {
    case UNLOCK_CONDITION_TYPE.ADDRESS:
    case UNLOCK_CONDITION_TYPE.STATE_CONTROLLER_ADDRESS:
    case UNLOCK_CONDITION_TYPE.GOVERNOR_ADDRESS:
      return { ...uc, address: normalizeAddress(uc.address) };
    case UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS: {
      const address = normalizeAddress(uc.address);
      if (address.type !== ADDRESS_TYPE.ALIAS) {
        throw new InvalidOutputError(
          "alias-address-required",
          "Immutable alias address unlock condition must hold an alias address",
        );
      }
      return { type: UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS, address };
    }
    case UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN:
      if (uc.amount <= 0n || uc.amount > U64_MAX) {
        throw new InvalidOutputError(
          "storage-deposit-return",
          `Storage deposit return amount must be in 1..u64 max, got ${uc.amount.toString()}`,
        );
      }
      return { ...uc, returnAddress: normalizeAddress(uc.returnAddress) };
    case UNLOCK_CONDITION_TYPE.TIMELOCK:
      checkUnixTime(uc.unixTime);
      return uc;
    case UNLOCK_CONDITION_TYPE.EXPIRATION:
      checkUnixTime(uc.unixTime);
      return { ...uc, returnAddress: normalizeAddress(uc.returnAddress) };
  }
}

function normalizeUnlockConditions(
  spec: OutputSpec,
  conditions: readonly UnlockCondition[],
): UnlockCondition[] {
  const allow = ALLOW_LISTS[spec.type];
  const seen = new Set<number>();
  const out: UnlockCondition[] = [];
  for (const uc of conditions) {
    if (!allow.unlockConditions.has(uc.type)) {
      throw new InvalidOutputError(
        "unlock-condition-not-allowed",
        `Unlock condition ${String(uc.type)} is not allowed on output type ${String(spec.type)}`,
      );
    }
    if (seen.has(uc.type)) {
      throw new InvalidOutputError(
        "duplicate-unlock-condition",
        `Unlock condition ${String(uc.type)} appears more than once`,
      );
    }
    seen.add(uc.type);
    out.push(normalizeUnlockCondition(uc));
  }
  for (const required of allow.requiredUnlockConditions) {
    if (!seen.has(required)) {
      throw new InvalidOutputError(
        "missing-unlock-condition",
        `Output type ${String(spec.type)} requires unlock condition ${String(required)}`,
      );
    }
  }
  return sortUnlockConditions(out);
}

function normalizeFeature(feature: Feature): Feature {
  switch (feature.type) {
    case FEATURE_TYPE.SENDER:
    case FEATURE_TYPE.ISSUER:
      return { ...feature, address: normalizeAddress(feature.address) };
    case FEATURE_TYPE.METADATA: {
      const data = decodeAs("encoding", () => normalizeHex(feature.data));
      const length = (data.length - 2) / 2;
      if (length < 1 || length > MAX_METADATA_LENGTH) {
        throw new InvalidOutputError(
          "metadata-length",
          `Metadata must be 1..${String(MAX_METADATA_LENGTH)} bytes, got ${String(length)}`,
        );
      }
      return { type: FEATURE_TYPE.METADATA, data };
    }
    case FEATURE_TYPE.TAG: {
      const tag = decodeAs("encoding", () => normalizeHex(feature.tag));
      const length = (tag.length - 2) / 2;
      if (length < 1 || length > MAX_TAG_LENGTH) {
        throw new InvalidOutputError(
          "tag-length",
          `Tag must be 1..${String(MAX_TAG_LENGTH)} bytes, got ${String(length)}`,
        );
      }
      return { type: FEATURE_TYPE.TAG, tag };
    }
  }
}

function normalizeFeatures(
  features: readonly Feature[],
  allowed: ReadonlySet<FeatureType>,
  immutable: boolean,
): Feature[] {
  const label = immutable ? "Immutable feature" : "Feature";
  const seen = new Set<number>();
  const out: Feature[] = [];
  for (const feature of features) {
    if (!allowed.has(feature.type)) {
      throw new InvalidOutputError(
        immutable ? "immutable-feature-not-allowed" : "feature-not-allowed",
        `${label} ${String(feature.type)} is not allowed on this output type`,
      );
    }
    if (seen.has(feature.type)) {
      throw new InvalidOutputError("duplicate-feature", `${label} ${String(feature.type)} appears more than once`);
    }
    seen.add(feature.type);
    out.push(normalizeFeature(feature));
  }
  return sortFeatures(out);
}

function checkTokenScheme(scheme: TokenScheme): void {
  const kind: number = scheme.type;
  if (kind !== TOKEN_SCHEME_TYPE.SIMPLE) {
    throw new InvalidOutputError("token-scheme", `Unknown token scheme ${String(kind)}`);
  }
  const { mintedTokens, meltedTokens, maximumSupply } = scheme;
  for (const value of [mintedTokens, meltedTokens, maximumSupply]) {
    if (value < 0n || value > U256_MAX) {
      throw new InvalidOutputError("token-scheme", `Token scheme value ${value.toString()} is outside the u256 range`);
    }
  }
  if (maximumSupply === 0n) {
    throw new InvalidOutputError("token-scheme", "Maximum supply must be greater than zero");
  }
  if (meltedTokens > mintedTokens) {
    throw new InvalidOutputError("token-scheme", "Melted tokens exceed minted tokens");
  }
  if (mintedTokens - meltedTokens > maximumSupply) {
    throw new InvalidOutputError("token-scheme", "Circulating supply exceeds the maximum supply");
  }
}

// =============================================================================
// Assembly
// =============================================================================

/** The canonical output with a placeholder amount, before deposit checks. */
function assemble(spec: OutputSpec, amount: bigint): Output {
  const allow = ALLOW_LISTS[spec.type];
  const nativeTokens = normalizeNativeTokens(spec.nativeTokens ?? []);
  const unlockConditions = normalizeUnlockConditions(spec, spec.unlockConditions);
  const features = normalizeFeatures(spec.features ?? [], allow.features, false);

  switch (spec.type) {
    case OUTPUT_TYPE.BASIC:
      return { type: OUTPUT_TYPE.BASIC, amount, nativeTokens, unlockConditions, features };

    case OUTPUT_TYPE.ALIAS: {
      const stateIndex = spec.stateIndex ?? 0;
      const foundryCounter = spec.foundryCounter ?? 0;
      checkU32(stateIndex, "State index");
      checkU32(foundryCounter, "Foundry counter");
      const stateMetadata = decodeAs("encoding", () => normalizeHex(spec.stateMetadata ?? "0x"));
      if ((stateMetadata.length - 2) / 2 > MAX_STATE_METADATA_LENGTH) {
        throw new InvalidOutputError(
          "state-metadata-length",
          `State metadata must be at most ${String(MAX_STATE_METADATA_LENGTH)} bytes`,
        );
      }
      return {
        type: OUTPUT_TYPE.ALIAS,
        amount,
        nativeTokens,
        aliasId: decodeAs("encoding", () => normalizeHex(spec.aliasId ?? ZERO_ID, ADDRESS_BODY_LENGTH)),
        stateIndex,
        stateMetadata,
        foundryCounter,
        unlockConditions,
        features,
        immutableFeatures: normalizeFeatures(spec.immutableFeatures ?? [], allow.immutableFeatures, true),
      };
    }

    case OUTPUT_TYPE.FOUNDRY:
      checkU32(spec.serialNumber, "Serial number");
      checkTokenScheme(spec.tokenScheme);
      return {
        type: OUTPUT_TYPE.FOUNDRY,
        amount,
        nativeTokens,
        serialNumber: spec.serialNumber,
        tokenScheme: spec.tokenScheme,
        unlockConditions,
        features,
        immutableFeatures: normalizeFeatures(spec.immutableFeatures ?? [], allow.immutableFeatures, true),
      };

    case OUTPUT_TYPE.NFT:
      return {
        type: OUTPUT_TYPE.NFT,
        amount,
        nativeTokens,
        nftId: decodeAs("encoding", () => normalizeHex(spec.nftId ?? ZERO_ID, ADDRESS_BODY_LENGTH)),
        unlockConditions,
        features,
        immutableFeatures: normalizeFeatures(spec.immutableFeatures ?? [], allow.immutableFeatures, true),
      };
  }
}

function checkStorageDepositReturn(output: Output, params: ProtocolParameters): void {
  for (const uc of output.unlockConditions) {
    if (uc.type !== UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN) continue;
    const minimum = minimumBasicOutputDeposit(params, uc.returnAddress);
    if (uc.amount < minimum) {
      throw new InvalidOutputError(
        "storage-deposit-return",
        `Storage deposit return amount ${uc.amount.toString()} is below the minimum ${minimum.toString()}`,
      );
    }
    if (uc.amount > output.amount) {
      throw new InvalidOutputError(
        "storage-deposit-return",
        `Storage deposit return amount ${uc.amount.toString()} exceeds the output amount ${output.amount.toString()}`,
      );
    }
  }
}

/**
 * Build a canonical output.
 *
 * @throws InvalidOutputError when any structural or deposit rule fails
 */
export function buildOutput(params: ProtocolParameters, spec: OutputSpec): Output {
  if (spec.amount !== "minimum") checkAmount(spec.amount, params);

  const draft = assemble(spec, spec.amount === "minimum" ? 0n : spec.amount);
  const deposit = minimumStorageDeposit(draft, params);

  let output: Output = draft;
  if (spec.amount === "minimum") {
    checkAmount(deposit, params);
    output = { ...draft, amount: deposit };
  } else if (draft.amount < deposit) {
    throw new InvalidOutputError(
      "storage-deposit",
      `Amount ${draft.amount.toString()} is below the minimum storage deposit ${deposit.toString()}`,
    );
  }

  checkStorageDepositReturn(output, params);
  return output;
}

// ─── Per-type builders ──────────────────────────────────────────────────

export function buildBasicOutput(params: ProtocolParameters, spec: WithoutType<BasicOutputSpec>): BasicOutput {
  const output = buildOutput(params, { ...spec, type: OUTPUT_TYPE.BASIC });
  if (output.type !== OUTPUT_TYPE.BASIC) throw new Error("unreachable: basic spec built a non-basic output");
  return output;
}

export function buildAliasOutput(params: ProtocolParameters, spec: WithoutType<AliasOutputSpec>): AliasOutput {
  const output = buildOutput(params, { ...spec, type: OUTPUT_TYPE.ALIAS });
  if (output.type !== OUTPUT_TYPE.ALIAS) throw new Error("unreachable: alias spec built a non-alias output");
  return output;
}

export function buildFoundryOutput(params: ProtocolParameters, spec: WithoutType<FoundryOutputSpec>): FoundryOutput {
  const output = buildOutput(params, { ...spec, type: OUTPUT_TYPE.FOUNDRY });
  if (output.type !== OUTPUT_TYPE.FOUNDRY) throw new Error("unreachable: foundry spec built a non-foundry output");
  return output;
}

export function buildNftOutput(params: ProtocolParameters, spec: WithoutType<NftOutputSpec>): NftOutput {
  const output = buildOutput(params, { ...spec, type: OUTPUT_TYPE.NFT });
  if (output.type !== OUTPUT_TYPE.NFT) throw new Error("unreachable: nft spec built a non-nft output");
  return output;
}

// ─── Part constructors ──────────────────────────────────────────────────

export function addressUnlockCondition(address: Address): UnlockCondition {
  return { type: UNLOCK_CONDITION_TYPE.ADDRESS, address };
}

export function storageDepositReturnUnlockCondition(returnAddress: Address, amount: bigint): UnlockCondition {
  return { type: UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN, returnAddress, amount };
}

export function timelockUnlockCondition(unixTime: number): UnlockCondition {
  return { type: UNLOCK_CONDITION_TYPE.TIMELOCK, unixTime };
}

export function expirationUnlockCondition(returnAddress: Address, unixTime: number): UnlockCondition {
  return { type: UNLOCK_CONDITION_TYPE.EXPIRATION, returnAddress, unixTime };
}

export function senderFeature(address: Address): Feature {
  return { type: FEATURE_TYPE.SENDER, address };
}

export function issuerFeature(address: Address): Feature {
  return { type: FEATURE_TYPE.ISSUER, address };
}

export function metadataFeature(data: HexString): Feature {
  return { type: FEATURE_TYPE.METADATA, data };
}

export function tagFeature(tag: HexString): Feature {
  return { type: FEATURE_TYPE.TAG, tag };
}

