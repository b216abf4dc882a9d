/**
 * Address codec.
 *
 * Binary form: kind byte ‖ 32-byte body (33 bytes).
 * Text form: bech32 of the binary form under the network hrp.
 */

import { bech32 } from "@scure/base";
import { ADDRESS_TYPE, WalletError, addressBody } from "@tanglekit/types";
import type { Address, AliasAddress, Ed25519Address, HexString } from "@tanglekit/types";
import { blake2b256 } from "./hash.js";
import { fromHex, toHex } from "./hex.js";
import type { ReadStream, WriteStream } from "./packer.js";

export const ADDRESS_BODY_LENGTH = 32;
export const ADDRESS_LENGTH = 1 + ADDRESS_BODY_LENGTH;

/** Build an address from its kind byte and 32-byte body. */
export function makeAddress(kind: number, body: Uint8Array): Address {
  if (body.length !== ADDRESS_BODY_LENGTH) {
    throw new WalletError(
      "INVALID_ENCODING",
      `Address body must be ${String(ADDRESS_BODY_LENGTH)} bytes, got ${String(body.length)}`,
    );
  }
  const hex = toHex(body);
  switch (kind) {
    case ADDRESS_TYPE.ED25519:
      return { type: ADDRESS_TYPE.ED25519, pubKeyHash: hex };
    case ADDRESS_TYPE.ALIAS:
      return { type: ADDRESS_TYPE.ALIAS, aliasId: hex };
    case ADDRESS_TYPE.NFT:
      return { type: ADDRESS_TYPE.NFT, nftId: hex };
    default:
      throw new WalletError("INVALID_ENCODING", `Unknown address kind ${String(kind)}`);
  }
}

export function ed25519Address(pubKeyHash: HexString): Ed25519Address {
  return { type: ADDRESS_TYPE.ED25519, pubKeyHash: toHex(fromHex(pubKeyHash, ADDRESS_BODY_LENGTH)) };
}

export function aliasAddress(aliasId: HexString): AliasAddress {
  return { type: ADDRESS_TYPE.ALIAS, aliasId: toHex(fromHex(aliasId, ADDRESS_BODY_LENGTH)) };
}

/** Address owned by an Ed25519 public key. */
export function ed25519AddressFromPublicKey(publicKey: Uint8Array): Ed25519Address {
  return { type: ADDRESS_TYPE.ED25519, pubKeyHash: toHex(blake2b256(publicKey)) };
}

export function addressToBytes(address: Address): Uint8Array {
  const out = new Uint8Array(ADDRESS_LENGTH);
  out[0] = address.type;
  out.set(fromHex(addressBody(address), ADDRESS_BODY_LENGTH), 1);
  return out;
}

export function addressFromBytes(bytes: Uint8Array): Address {
  if (bytes.length !== ADDRESS_LENGTH) {
    throw new WalletError(
      "INVALID_ENCODING",
      `Address must be ${String(ADDRESS_LENGTH)} bytes, got ${String(bytes.length)}`,
    );
  }
  return makeAddress(bytes[0] ?? -1, bytes.subarray(1));
}

export function writeAddress(stream: WriteStream, address: Address): void {
  stream.writeBytes(addressToBytes(address));
}

export function readAddress(stream: ReadStream): Address {
  const kind = stream.readU8();
  return makeAddress(kind, stream.readBytes(ADDRESS_BODY_LENGTH));
}

export function addressToBech32(address: Address, hrp: string): string {
  return bech32.encode(hrp, bech32.toWords(addressToBytes(address)));
}

/**
 * Decode a bech32 address.
 *
 * @throws WalletError INVALID_ENCODING on a bad checksum, kind or length
 */
export function bech32ToAddress(text: string): { hrp: string; address: Address } {
  let decoded: { prefix: string; bytes: Uint8Array };
  try {
    decoded = bech32.decodeToBytes(text);
  } catch (err: unknown) {
    throw new WalletError("INVALID_ENCODING", `Invalid bech32 address "${text}"`, { cause: err });
  }
  return { hrp: decoded.prefix, address: addressFromBytes(decoded.bytes) };
}

/** Convert a bech32 address to the hex of its binary form. */
export function bech32ToHex(text: string): HexString {
  return toHex(addressToBytes(bech32ToAddress(text).address));
}

export function hexToBech32(hex: HexString, hrp: string): string {
  return addressToBech32(addressFromBytes(fromHex(hex, ADDRESS_LENGTH)), hrp);
}
