/**
 * Native token ids.
 *
 * A token id is the id of the foundry that minted it:
 * alias address (33 bytes) ‖ serial number (u32 LE) ‖ token scheme kind (u8).
 */

import { TOKEN_SCHEME_TYPE } from "@tanglekit/types";
import type { HexString } from "@tanglekit/types";
import { aliasAddress, addressToBytes } from "./address.js";
import { fromHex, toHex } from "./hex.js";
import { WriteStream } from "./packer.js";

export const NATIVE_TOKEN_ID_LENGTH = 38;

export function buildFoundryId(
  aliasId: HexString,
  serialNumber: number,
  tokenSchemeType: number = TOKEN_SCHEME_TYPE.SIMPLE,
): HexString {
  const stream = new WriteStream()
    .writeBytes(addressToBytes(aliasAddress(aliasId)))
    .writeU32(serialNumber)
    .writeU8(tokenSchemeType);
  return toHex(stream.finish());
}

/** Validate and lowercase a token id; equality is then plain string equality. */
export function normalizeTokenId(id: string): HexString {
  return toHex(fromHex(id, NATIVE_TOKEN_ID_LENGTH));
}
