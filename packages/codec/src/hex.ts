/**
 * Hex encoding helpers.
 *
 * All hex strings in the engine are 0x-prefixed and lowercase on output;
 * input is accepted in either case.
 */

import { WalletError } from "@tanglekit/types";
import type { HexString } from "@tanglekit/types";

const HEX_BODY = /^([0-9a-fA-F]{2})*$/;

export function toHex(bytes: Uint8Array): HexString {
  return `0x${Buffer.from(bytes).toString("hex")}`;
}

/**
 * Decode a 0x-prefixed hex string.
 *
 * @param expectedLength - Required byte length, if any
 * @throws WalletError INVALID_ENCODING on malformed input or length mismatch
 */
export function fromHex(hex: string, expectedLength?: number): Uint8Array {
  if (!hex.startsWith("0x")) {
    throw new WalletError("INVALID_ENCODING", `Hex string must be 0x-prefixed: "${hex}"`);
  }
  const body = hex.slice(2);
  if (!HEX_BODY.test(body)) {
    throw new WalletError("INVALID_ENCODING", `Invalid hex string: "${hex}"`);
  }
  const bytes = new Uint8Array(Buffer.from(body, "hex"));
  if (expectedLength !== undefined && bytes.length !== expectedLength) {
    throw new WalletError(
      "INVALID_ENCODING",
      `Expected ${String(expectedLength)} bytes, got ${String(bytes.length)}: "${hex}"`,
    );
  }
  return bytes;
}

/** Lowercase a hex string after validating it. */
export function normalizeHex(hex: string, expectedLength?: number): HexString {
  return toHex(fromHex(hex, expectedLength));
}

export function utf8ToHex(text: string): HexString {
  return toHex(new TextEncoder().encode(text));
}

export function hexToUtf8(hex: string): string {
  return new TextDecoder().decode(fromHex(hex));
}

/** Byte-wise lexicographic comparison, usable as a sort comparator. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
