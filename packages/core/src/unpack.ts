// ============================================================================
// MessagePack Unpacker — wire bytes → Canonical Value
// ============================================================================

import { MessagePackDecodeError } from './errors.js';
import { FORMAT } from './pack.js';
import type { MessagePackEntry, MessagePackValue } from './value.js';
import { map } from './value.js';

/** One decoded value and the bytes that follow it. */
export interface UnpackResult {
  value: MessagePackValue;
  remainder: Uint8Array;
}

const sharedTextDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads MessagePack values from a byte buffer.
 *
 * Positive integer formats decode to `uint`, negative formats to `int`.
 */
class MessagePackReader {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  get done(): boolean {
    return this.offset >= this.buffer.byteLength;
  }

  private need(n: number) {
    if (this.offset + n > this.buffer.byteLength) {
      throw new MessagePackDecodeError(
        `Insufficient data: need ${n} byte(s), have ${this.buffer.byteLength - this.offset}`,
        this.offset,
      );
    }
  }

  private u8(): number {
    this.need(1);
    return this.buffer[this.offset++];
  }

  private u16(): number {
    this.need(2);
    const v = this.view.getUint16(this.offset);
    this.offset += 2;
    return v;
  }

  private u32(): number {
    this.need(4);
    const v = this.view.getUint32(this.offset);
    this.offset += 4;
    return v;
  }

  private bytes(n: number): Uint8Array {
    this.need(n);
    const out = this.buffer.slice(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  private str(n: number): MessagePackValue {
    const start = this.offset;
    const raw = this.bytes(n);
    try {
      return { kind: 'string', value: sharedTextDecoder.decode(raw) };
    } catch {
      throw new MessagePackDecodeError('Invalid UTF-8 in string', start);
    }
  }

  private arrayOf(n: number): MessagePackValue {
    const items: MessagePackValue[] = [];
    for (let i = 0; i < n; i++) items.push(this.read());
    return { kind: 'array', value: items };
  }

  private mapOf(n: number): MessagePackValue {
    const entries: MessagePackEntry[] = [];
    for (let i = 0; i < n; i++) {
      const key = this.read();
      entries.push([key, this.read()]);
    }
    return map(entries);
  }

  private ext(n: number): MessagePackValue {
    const type = (this.u8() << 24) >> 24;
    return { kind: 'extended', type, data: this.bytes(n) };
  }

  read(): MessagePackValue {
    const start = this.offset;
    const b = this.u8();

    if (b <= 0x7f) return { kind: 'uint', value: BigInt(b) };
    if (b >= 0xe0) return { kind: 'int', value: BigInt(b - 0x100) };
    if ((b & 0xf0) === 0x80) return this.mapOf(b & 0x0f);
    if ((b & 0xf0) === 0x90) return this.arrayOf(b & 0x0f);
    if ((b & 0xe0) === 0xa0) return this.str(b & 0x1f);

    switch (b) {
      case FORMAT.NIL:
        return { kind: 'nil' };
      case FORMAT.FALSE:
        return { kind: 'bool', value: false };
      case FORMAT.TRUE:
        return { kind: 'bool', value: true };
      case FORMAT.BIN8:
        return { kind: 'binary', value: this.bytes(this.u8()) };
      case FORMAT.BIN16:
        return { kind: 'binary', value: this.bytes(this.u16()) };
      case FORMAT.BIN32:
        return { kind: 'binary', value: this.bytes(this.u32()) };
      case FORMAT.EXT8:
        return this.ext(this.u8());
      case FORMAT.EXT16:
        return this.ext(this.u16());
      case FORMAT.EXT32:
        return this.ext(this.u32());
      case FORMAT.FLOAT32: {
        this.need(4);
        const v = this.view.getFloat32(this.offset);
        this.offset += 4;
        return { kind: 'float', value: v };
      }
      case FORMAT.FLOAT64: {
        this.need(8);
        const v = this.view.getFloat64(this.offset);
        this.offset += 8;
        return { kind: 'double', value: v };
      }
      case FORMAT.UINT8:
        return { kind: 'uint', value: BigInt(this.u8()) };
      case FORMAT.UINT16:
        return { kind: 'uint', value: BigInt(this.u16()) };
      case FORMAT.UINT32:
        return { kind: 'uint', value: BigInt(this.u32()) };
      case FORMAT.UINT64: {
        this.need(8);
        const v = this.view.getBigUint64(this.offset);
        this.offset += 8;
        return { kind: 'uint', value: v };
      }
      case FORMAT.INT8:
        return { kind: 'int', value: BigInt((this.u8() << 24) >> 24) };
      case FORMAT.INT16:
        return { kind: 'int', value: BigInt((this.u16() << 16) >> 16) };
      case FORMAT.INT32:
        return { kind: 'int', value: BigInt(this.u32() | 0) };
      case FORMAT.INT64: {
        this.need(8);
        const v = this.view.getBigInt64(this.offset);
        this.offset += 8;
        return { kind: 'int', value: v };
      }
      case FORMAT.FIXEXT1:
        return this.ext(1);
      case FORMAT.FIXEXT2:
        return this.ext(2);
      case FORMAT.FIXEXT4:
        return this.ext(4);
      case FORMAT.FIXEXT8:
        return this.ext(8);
      case FORMAT.FIXEXT16:
        return this.ext(16);
      case FORMAT.STR8:
        return this.str(this.u8());
      case FORMAT.STR16:
        return this.str(this.u16());
      case FORMAT.STR32:
        return this.str(this.u32());
      case FORMAT.ARRAY16:
        return this.arrayOf(this.u16());
      case FORMAT.ARRAY32:
        return this.arrayOf(this.u32());
      case FORMAT.MAP16:
        return this.mapOf(this.u16());
      case FORMAT.MAP32:
        return this.mapOf(this.u32());
      default:
        throw new MessagePackDecodeError(`Invalid format byte 0x${b.toString(16)}`, start);
    }
  }

  rest(): Uint8Array {
    return this.buffer.subarray(this.offset);
  }
}

/**
 * Decode one value from the front of `bytes`.
 *
 * @returns the value and the unread tail (a view, not a copy)
 * @throws {MessagePackDecodeError} on truncated or malformed input
 */
export function unpack(bytes: Uint8Array): UnpackResult {
  const reader = new MessagePackReader(bytes);
  const value = reader.read();
  return { value, remainder: reader.rest() };
}

/**
 * Decode consecutive values until the input is exhausted.
 */
export function unpackAll(bytes: Uint8Array): MessagePackValue[] {
  const reader = new MessagePackReader(bytes);
  const values: MessagePackValue[] = [];
  while (!reader.done) values.push(reader.read());
  return values;
}
