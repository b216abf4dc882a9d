/**
 * @tanglekit/codec — Primitive encodings.
 *
 * Hex, little-endian packing, BLAKE2b-256, the binary and bech32 address
 * forms, and native token ids. Everything above this package builds its
 * wire format from these pieces.
 */

export {
  toHex,
  fromHex,
  normalizeHex,
  utf8ToHex,
  hexToUtf8,
  compareBytes,
  concatBytes,
} from "./hex.js";

export { blake2b256, HASH_LENGTH } from "./hash.js";

export {
  WriteStream,
  ReadStream,
  U8_MAX,
  U16_MAX,
  U32_MAX,
  U64_MAX,
  U256_MAX,
} from "./packer.js";

export {
  ADDRESS_BODY_LENGTH,
  ADDRESS_LENGTH,
  makeAddress,
  ed25519Address,
  aliasAddress,
  ed25519AddressFromPublicKey,
  addressToBytes,
  addressFromBytes,
  writeAddress,
  readAddress,
  addressToBech32,
  bech32ToAddress,
  bech32ToHex,
  hexToBech32,
} from "./address.js";

export { NATIVE_TOKEN_ID_LENGTH, buildFoundryId, normalizeTokenId } from "./token-id.js";
