/**
 * Output JSON mapping.
 *
 * The node REST API carries outputs as JSON: u64 amounts as decimal
 * strings, u256 amounts as 0x-prefixed hex, byte payloads as hex. Incoming
 * JSON is validated with Zod and mapped to the domain model.
 */

import { z } from "zod";
import { WalletError } from "@tanglekit/types";
import type { Address, Feature, Output, TokenScheme, UnlockCondition } from "@tanglekit/types";

// =============================================================================
// Scalars
// =============================================================================

const HexSchema = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, "Expected 0x-prefixed hex")
  .transform((s) => s.toLowerCase());

function fixedHex(bytes: number) {
  return z
    .string()
    .regex(new RegExp(`^0x[0-9a-fA-F]{${String(bytes * 2)}}$`), `Expected ${String(bytes)} bytes of hex`)
    .transform((s) => s.toLowerCase());
}

const Id32Schema = fixedHex(32);

const U64Schema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal u64 string")
  .transform((s) => BigInt(s));

const U256Schema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{1,64}$/, "Expected a hex u256")
  .transform((s) => BigInt(s));

const U32Schema = z.number().int().min(0).max(0xffffffff);

// =============================================================================
// Addresses
// =============================================================================

const Ed25519AddressSchema = z.object({ type: z.literal(0), pubKeyHash: Id32Schema });
const AliasAddressSchema = z.object({ type: z.literal(8), aliasId: Id32Schema });
const NftAddressSchema = z.object({ type: z.literal(16), nftId: Id32Schema });

export const AddressJsonSchema = z.discriminatedUnion("type", [
  Ed25519AddressSchema,
  AliasAddressSchema,
  NftAddressSchema,
]);

// =============================================================================
// Unlock conditions & features
// =============================================================================

export const UnlockConditionJsonSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal(0), address: AddressJsonSchema }),
  z.object({ type: z.literal(1), returnAddress: AddressJsonSchema, amount: U64Schema }),
  z.object({ type: z.literal(2), unixTime: U32Schema }),
  z.object({ type: z.literal(3), returnAddress: AddressJsonSchema, unixTime: U32Schema }),
  z.object({ type: z.literal(4), address: AddressJsonSchema }),
  z.object({ type: z.literal(5), address: AddressJsonSchema }),
  z.object({ type: z.literal(6), address: AliasAddressSchema }),
]);

export const FeatureJsonSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal(0), address: AddressJsonSchema }),
  z.object({ type: z.literal(1), address: AddressJsonSchema }),
  z.object({ type: z.literal(2), data: HexSchema }),
  z.object({ type: z.literal(3), tag: HexSchema }),
]);

const NativeTokenJsonSchema = z.object({ id: fixedHex(38), amount: U256Schema });

const TokenSchemeJsonSchema = z.object({
  type: z.literal(0),
  mintedTokens: U256Schema,
  meltedTokens: U256Schema,
  maximumSupply: U256Schema,
});

// =============================================================================
// Outputs
// =============================================================================

const common = {
  amount: U64Schema,
  nativeTokens: z.array(NativeTokenJsonSchema).default([]),
  unlockConditions: z.array(UnlockConditionJsonSchema),
  features: z.array(FeatureJsonSchema).default([]),
};

export const OutputJsonSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal(3), ...common }),
  z.object({
    type: z.literal(4),
    ...common,
    aliasId: Id32Schema,
    stateIndex: U32Schema,
    stateMetadata: HexSchema.default("0x"),
    foundryCounter: U32Schema,
    immutableFeatures: z.array(FeatureJsonSchema).default([]),
  }),
  z.object({
    type: z.literal(5),
    ...common,
    serialNumber: U32Schema,
    tokenScheme: TokenSchemeJsonSchema,
    immutableFeatures: z.array(FeatureJsonSchema).default([]),
  }),
  z.object({
    type: z.literal(6),
    ...common,
    nftId: Id32Schema,
    immutableFeatures: z.array(FeatureJsonSchema).default([]),
  }),
]);

export type OutputJson = z.input<typeof OutputJsonSchema>;
export type AddressJson = z.input<typeof AddressJsonSchema>;
type UnlockConditionJson = z.input<typeof UnlockConditionJsonSchema>;
type FeatureJson = z.input<typeof FeatureJsonSchema>;
type TokenSchemeJson = z.input<typeof TokenSchemeJsonSchema>;

/**
 * Map node JSON to an output.
 *
 * @throws WalletError INVALID_ENCODING when the JSON does not describe an output
 */
export function outputFromJson(json: unknown): Output {
  const result = OutputJsonSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new WalletError("INVALID_ENCODING", `Invalid output JSON${where}: ${issue?.message ?? "unknown"}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ─── Domain → JSON ──────────────────────────────────────────────────────

function u256ToJson(value: bigint): string {
  return `0x${value.toString(16)}`;
}

export function addressToJson(address: Address): AddressJson {
  return { ...address };
}

function unlockConditionToJson(uc: UnlockCondition): UnlockConditionJson {
  switch (uc.type) {
    case 1:
      return { type: 1, returnAddress: addressToJson(uc.returnAddress), amount: uc.amount.toString() };
    case 2:
      return { type: 2, unixTime: uc.unixTime };
    case 3:
      return { type: 3, returnAddress: addressToJson(uc.returnAddress), unixTime: uc.unixTime };
    case 6:
      return { type: 6, address: { ...uc.address } };
    default:
      return { type: uc.type, address: addressToJson(uc.address) };
  }
}

function featureToJson(feature: Feature): FeatureJson {
  switch (feature.type) {
    case 0:
    case 1:
      return { type: feature.type, address: addressToJson(feature.address) };
    case 2:
      return { type: 2, data: feature.data };
    case 3:
      return { type: 3, tag: feature.tag };
  }
}

function tokenSchemeToJson(scheme: TokenScheme): TokenSchemeJson {
  return {
    type: scheme.type,
    mintedTokens: u256ToJson(scheme.mintedTokens),
    meltedTokens: u256ToJson(scheme.meltedTokens),
    maximumSupply: u256ToJson(scheme.maximumSupply),
  };
}

export function outputToJson(output: Output): OutputJson {
  const base = {
    amount: output.amount.toString(),
    nativeTokens: output.nativeTokens.map((t) => ({ id: t.id, amount: u256ToJson(t.amount) })),
    unlockConditions: output.unlockConditions.map(unlockConditionToJson),
    features: output.features.map(featureToJson),
  };
  switch (output.type) {
    case 3:
      return { type: 3, ...base };
    case 4:
      return {
        type: 4,
        ...base,
        aliasId: output.aliasId,
        stateIndex: output.stateIndex,
        stateMetadata: output.stateMetadata,
        foundryCounter: output.foundryCounter,
        immutableFeatures: output.immutableFeatures.map(featureToJson),
      };
    case 5:
      return {
        type: 5,
        ...base,
        serialNumber: output.serialNumber,
        tokenScheme: tokenSchemeToJson(output.tokenScheme),
        immutableFeatures: output.immutableFeatures.map(featureToJson),
      };
    case 6:
      return {
        type: 6,
        ...base,
        nftId: output.nftId,
        immutableFeatures: output.immutableFeatures.map(featureToJson),
      };
  }
}
