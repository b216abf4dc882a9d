/**
 * Little-endian binary packer.
 *
 * The wire layout of outputs and transactions is built from a handful of
 * fixed-width integers and byte strings. WriteStream refuses values that do
 * not fit their width; ReadStream refuses to read past the end.
 */

import { OverflowError, WalletError } from "@tanglekit/types";

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffff_ffff;
export const U64_MAX = (1n << 64n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;

function assertIntRange(value: number, max: number, width: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new OverflowError(`Value ${String(value)} does not fit in ${width}`);
  }
}

function assertBigRange(value: bigint, max: bigint, width: string): void {
  if (value < 0n || value > max) {
    throw new OverflowError(`Value ${value.toString()} does not fit in ${width}`);
  }
}

export class WriteStream {
  private buffer = new Uint8Array(256);
  private length = 0;

  private ensure(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let size = this.buffer.length * 2;
    while (size < this.length + extra) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }

  writeU8(value: number): this {
    assertIntRange(value, U8_MAX, "u8");
    this.ensure(1);
    this.buffer[this.length++] = value;
    return this;
  }

  writeU16(value: number): this {
    assertIntRange(value, U16_MAX, "u16");
    this.ensure(2);
    new DataView(this.buffer.buffer).setUint16(this.length, value, true);
    this.length += 2;
    return this;
  }

  writeU32(value: number): this {
    assertIntRange(value, U32_MAX, "u32");
    this.ensure(4);
    new DataView(this.buffer.buffer).setUint32(this.length, value, true);
    this.length += 4;
    return this;
  }

  writeU64(value: bigint): this {
    assertBigRange(value, U64_MAX, "u64");
    this.ensure(8);
    new DataView(this.buffer.buffer).setBigUint64(this.length, value, true);
    this.length += 8;
    return this;
  }

  writeU256(value: bigint): this {
    assertBigRange(value, U256_MAX, "u256");
    this.ensure(32);
    let rest = value;
    for (let i = 0; i < 32; i++) {
      this.buffer[this.length + i] = Number(rest & 0xffn);
      rest >>= 8n;
    }
    this.length += 32;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
    return this;
  }

  /** Copy of the written bytes. */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}

export class ReadStream {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private take(n: number): number {
    if (this.offset + n > this.bytes.length) {
      throw new WalletError(
        "INVALID_ENCODING",
        `Unexpected end of data: need ${String(n)} byte(s) at offset ${String(this.offset)}, have ${String(this.bytes.length - this.offset)}`,
      );
    }
    const at = this.offset;
    this.offset += n;
    return at;
  }

  readU8(): number {
    return this.view.getUint8(this.take(1));
  }

  readU16(): number {
    return this.view.getUint16(this.take(2), true);
  }

  readU32(): number {
    return this.view.getUint32(this.take(4), true);
  }

  readU64(): bigint {
    return this.view.getBigUint64(this.take(8), true);
  }

  readU256(): bigint {
    const at = this.take(32);
    let value = 0n;
    for (let i = 31; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.bytes[at + i] ?? 0);
    }
    return value;
  }

  readBytes(n: number): Uint8Array {
    const at = this.take(n);
    return this.bytes.slice(at, at + n);
  }

  /** Bytes left unread. */
  remaining(): number {
    return this.bytes.length - this.offset;
  }

  /** Throw if the stream was not fully consumed. */
  assertFinished(): void {
    if (this.remaining() !== 0) {
      throw new WalletError(
        "INVALID_ENCODING",
        `${String(this.remaining())} trailing byte(s) after decode`,
      );
    }
  }
}
