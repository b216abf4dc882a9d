/**
 * Output wire format.
 *
 * Layout (all integers little-endian):
 *
 *   output     := type:u8 amount:u64 nativeTokens <type-specific> unlockConds features [immutableFeatures]
 *   nativeTokens := count:u8 (id:38 amount:u256)*
 *   unlockConds  := count:u8 (kind:u8 body)*
 *   features     := count:u8 (kind:u8 body)*
 *
 *   alias   := aliasId:32 stateIndex:u32 stateMetadata:(len:u16 bytes) foundryCounter:u32
 *   foundry := serialNumber:u32 tokenScheme:(kind:u8 minted:u256 melted:u256 max:u256)
 *   nft     := nftId:32
 *
 * The serialized length drives the storage deposit, so this module and the
 * node's validation must agree byte for byte.
 */

import {
  ADDRESS_TYPE,
  FEATURE_TYPE,
  OUTPUT_TYPE,
  TOKEN_SCHEME_TYPE,
  UNLOCK_CONDITION_TYPE,
  WalletError,
} from "@tanglekit/types";
import type {
  Feature,
  NativeToken,
  Output,
  TokenScheme,
  UnlockCondition,
} from "@tanglekit/types";
import {
  NATIVE_TOKEN_ID_LENGTH,
  ReadStream,
  WriteStream,
  fromHex,
  readAddress,
  toHex,
  writeAddress,
} from "@tanglekit/codec";

const ID_LENGTH = 32;

// =============================================================================
// Writing
// =============================================================================

function writeNativeTokens(stream: WriteStream, tokens: readonly NativeToken[]): void {
  stream.writeU8(tokens.length);
  for (const token of tokens) {
    stream.writeBytes(fromHex(token.id, NATIVE_TOKEN_ID_LENGTH));
    stream.writeU256(token.amount);
  }
}

export function writeUnlockCondition(stream: WriteStream, uc: UnlockCondition): void {
  stream.writeU8(uc.type);
  switch (uc.type) {
    case UNLOCK_CONDITION_TYPE.ADDRESS:
    case UNLOCK_CONDITION_TYPE.STATE_CONTROLLER_ADDRESS:
    case UNLOCK_CONDITION_TYPE.GOVERNOR_ADDRESS:
    case UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS:
      writeAddress(stream, uc.address);
      break;
    case UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN:
      writeAddress(stream, uc.returnAddress);
      stream.writeU64(uc.amount);
      break;
    case UNLOCK_CONDITION_TYPE.TIMELOCK:
      stream.writeU32(uc.unixTime);
      break;
    case UNLOCK_CONDITION_TYPE.EXPIRATION:
      writeAddress(stream, uc.returnAddress);
      stream.writeU32(uc.unixTime);
      break;
  }
}

export function writeFeature(stream: WriteStream, feature: Feature): void {
  stream.writeU8(feature.type);
  switch (feature.type) {
    case FEATURE_TYPE.SENDER:
    case FEATURE_TYPE.ISSUER:
      writeAddress(stream, feature.address);
      break;
    case FEATURE_TYPE.METADATA: {
      const data = fromHex(feature.data);
      stream.writeU16(data.length).writeBytes(data);
      break;
    }
    case FEATURE_TYPE.TAG: {
      const tag = fromHex(feature.tag);
      stream.writeU8(tag.length).writeBytes(tag);
      break;
    }
  }
}

function writeFeatures(stream: WriteStream, features: readonly Feature[]): void {
  stream.writeU8(features.length);
  for (const f of features) writeFeature(stream, f);
}

function writeTokenScheme(stream: WriteStream, scheme: TokenScheme): void {
  stream
    .writeU8(scheme.type)
    .writeU256(scheme.mintedTokens)
    .writeU256(scheme.meltedTokens)
    .writeU256(scheme.maximumSupply);
}

export function writeOutput(stream: WriteStream, output: Output): void {
  stream.writeU8(output.type).writeU64(output.amount);
  writeNativeTokens(stream, output.nativeTokens);

  switch (output.type) {
    case OUTPUT_TYPE.BASIC:
      break;
    case OUTPUT_TYPE.ALIAS: {
      const stateMetadata = fromHex(output.stateMetadata);
      stream
        .writeBytes(fromHex(output.aliasId, ID_LENGTH))
        .writeU32(output.stateIndex)
        .writeU16(stateMetadata.length)
        .writeBytes(stateMetadata)
        .writeU32(output.foundryCounter);
      break;
    }
    case OUTPUT_TYPE.FOUNDRY:
      stream.writeU32(output.serialNumber);
      writeTokenScheme(stream, output.tokenScheme);
      break;
    case OUTPUT_TYPE.NFT:
      stream.writeBytes(fromHex(output.nftId, ID_LENGTH));
      break;
  }

  stream.writeU8(output.unlockConditions.length);
  for (const uc of output.unlockConditions) writeUnlockCondition(stream, uc);
  writeFeatures(stream, output.features);

  if (output.type !== OUTPUT_TYPE.BASIC) {
    writeFeatures(stream, output.immutableFeatures);
  }
}

export function serializeOutput(output: Output): Uint8Array {
  const stream = new WriteStream();
  writeOutput(stream, output);
  return stream.finish();
}

// =============================================================================
// Reading
// =============================================================================

function readNativeTokens(stream: ReadStream): NativeToken[] {
  const count = stream.readU8();
  const tokens: NativeToken[] = [];
  for (let i = 0; i < count; i++) {
    const id = toHex(stream.readBytes(NATIVE_TOKEN_ID_LENGTH));
    tokens.push({ id, amount: stream.readU256() });
  }
  return tokens;
}

export function readUnlockCondition(stream: ReadStream): UnlockCondition {
  const kind = stream.readU8();
  switch (kind) {
    case UNLOCK_CONDITION_TYPE.ADDRESS:
      return { type: UNLOCK_CONDITION_TYPE.ADDRESS, address: readAddress(stream) };
    case UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN: {
      const returnAddress = readAddress(stream);
      return { type: UNLOCK_CONDITION_TYPE.STORAGE_DEPOSIT_RETURN, returnAddress, amount: stream.readU64() };
    }
    case UNLOCK_CONDITION_TYPE.TIMELOCK:
      return { type: UNLOCK_CONDITION_TYPE.TIMELOCK, unixTime: stream.readU32() };
    case UNLOCK_CONDITION_TYPE.EXPIRATION: {
      const returnAddress = readAddress(stream);
      return { type: UNLOCK_CONDITION_TYPE.EXPIRATION, returnAddress, unixTime: stream.readU32() };
    }
    case UNLOCK_CONDITION_TYPE.STATE_CONTROLLER_ADDRESS:
      return { type: UNLOCK_CONDITION_TYPE.STATE_CONTROLLER_ADDRESS, address: readAddress(stream) };
    case UNLOCK_CONDITION_TYPE.GOVERNOR_ADDRESS:
      return { type: UNLOCK_CONDITION_TYPE.GOVERNOR_ADDRESS, address: readAddress(stream) };
    case UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS: {
      const address = readAddress(stream);
      if (address.type !== ADDRESS_TYPE.ALIAS) {
        throw new WalletError("INVALID_ENCODING", "Immutable alias address unlock condition holds a non-alias address");
      }
      return { type: UNLOCK_CONDITION_TYPE.IMMUTABLE_ALIAS_ADDRESS, address };
    }
    default:
      throw new WalletError("INVALID_ENCODING", `Unknown unlock condition kind ${String(kind)}`);
  }
}

export function readFeature(stream: ReadStream): Feature {
  const kind = stream.readU8();
  switch (kind) {
    case FEATURE_TYPE.SENDER:
      return { type: FEATURE_TYPE.SENDER, address: readAddress(stream) };
    case FEATURE_TYPE.ISSUER:
      return { type: FEATURE_TYPE.ISSUER, address: readAddress(stream) };
    case FEATURE_TYPE.METADATA:
      return { type: FEATURE_TYPE.METADATA, data: toHex(stream.readBytes(stream.readU16())) };
    case FEATURE_TYPE.TAG:
      return { type: FEATURE_TYPE.TAG, tag: toHex(stream.readBytes(stream.readU8())) };
    default:
      throw new WalletError("INVALID_ENCODING", `Unknown feature kind ${String(kind)}`);
  }
}

function readList<T>(stream: ReadStream, read: (s: ReadStream) => T): T[] {
  const count = stream.readU8();
  const items: T[] = [];
  for (let i = 0; i < count; i++) items.push(read(stream));
  return items;
}

function readTokenScheme(stream: ReadStream): TokenScheme {
  const kind = stream.readU8();
  if (kind !== TOKEN_SCHEME_TYPE.SIMPLE) {
    throw new WalletError("INVALID_ENCODING", `Unknown token scheme kind ${String(kind)}`);
  }
  return {
    type: TOKEN_SCHEME_TYPE.SIMPLE,
    mintedTokens: stream.readU256(),
    meltedTokens: stream.readU256(),
    maximumSupply: stream.readU256(),
  };
}

export function readOutput(stream: ReadStream): Output {
  const type = stream.readU8();
  const amount = stream.readU64();
  const nativeTokens = readNativeTokens(stream);

  switch (type) {
    case OUTPUT_TYPE.BASIC: {
      const unlockConditions = readList(stream, readUnlockCondition);
      const features = readList(stream, readFeature);
      return { type: OUTPUT_TYPE.BASIC, amount, nativeTokens, unlockConditions, features };
    }
    case OUTPUT_TYPE.ALIAS: {
      const aliasId = toHex(stream.readBytes(ID_LENGTH));
      const stateIndex = stream.readU32();
      const stateMetadata = toHex(stream.readBytes(stream.readU16()));
      const foundryCounter = stream.readU32();
      const unlockConditions = readList(stream, readUnlockCondition);
      const features = readList(stream, readFeature);
      const immutableFeatures = readList(stream, readFeature);
      return {
        type: OUTPUT_TYPE.ALIAS, amount, nativeTokens, aliasId, stateIndex, stateMetadata,
        foundryCounter, unlockConditions, features, immutableFeatures,
      };
    }
    case OUTPUT_TYPE.FOUNDRY: {
      const serialNumber = stream.readU32();
      const tokenScheme = readTokenScheme(stream);
      const unlockConditions = readList(stream, readUnlockCondition);
      const features = readList(stream, readFeature);
      const immutableFeatures = readList(stream, readFeature);
      return {
        type: OUTPUT_TYPE.FOUNDRY, amount, nativeTokens, serialNumber, tokenScheme,
        unlockConditions, features, immutableFeatures,
      };
    }
    case OUTPUT_TYPE.NFT: {
      const nftId = toHex(stream.readBytes(ID_LENGTH));
      const unlockConditions = readList(stream, readUnlockCondition);
      const features = readList(stream, readFeature);
      const immutableFeatures = readList(stream, readFeature);
      return { type: OUTPUT_TYPE.NFT, amount, nativeTokens, nftId, unlockConditions, features, immutableFeatures };
    }
    default:
      throw new WalletError("INVALID_ENCODING", `Unknown output type ${String(type)}`);
  }
}

/**
 * Decode a single serialized output. Trailing bytes are an error.
 */
export function deserializeOutput(bytes: Uint8Array): Output {
  const stream = new ReadStream(bytes);
  const output = readOutput(stream);
  stream.assertFinished();
  return output;
}
