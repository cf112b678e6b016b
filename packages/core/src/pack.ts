// ============================================================================
// MessagePack Packer — Canonical Value → wire bytes
// ============================================================================
//
// Deterministic and total: every MessagePackValue has exactly one byte form.
// Integers take the smallest format that holds them; non-negative values use
// the unsigned family whatever their tag, negative values the signed one.
// Floats keep their declared width.

import type { MessagePackValue } from './value.js';

/** MessagePack format bytes. */
export const FORMAT = {
  NIL: 0xc0,
  FALSE: 0xc2,
  TRUE: 0xc3,
  BIN8: 0xc4,
  BIN16: 0xc5,
  BIN32: 0xc6,
  EXT8: 0xc7,
  EXT16: 0xc8,
  EXT32: 0xc9,
  FLOAT32: 0xca,
  FLOAT64: 0xcb,
  UINT8: 0xcc,
  UINT16: 0xcd,
  UINT32: 0xce,
  UINT64: 0xcf,
  INT8: 0xd0,
  INT16: 0xd1,
  INT32: 0xd2,
  INT64: 0xd3,
  FIXEXT1: 0xd4,
  FIXEXT2: 0xd5,
  FIXEXT4: 0xd6,
  FIXEXT8: 0xd7,
  FIXEXT16: 0xd8,
  STR8: 0xd9,
  STR16: 0xda,
  STR32: 0xdb,
  ARRAY16: 0xdc,
  ARRAY32: 0xdd,
  MAP16: 0xde,
  MAP32: 0xdf,
} as const;

// ── Shared instances (avoid per-call allocation) ────────────────────────────

const sharedTextEncoder = new TextEncoder();

const scratchAB = new ArrayBuffer(8);
const scratchDV = new DataView(scratchAB);
const scratchU8 = new Uint8Array(scratchAB);

// ── Growable Buffer ─────────────────────────────────────────────────────────

/**
 * A growable byte buffer backed by a Uint8Array.
 * Doubles capacity on overflow. Multi-byte numbers are written big-endian.
 */
class GrowableBuffer {
  private buf: Uint8Array;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(initialCapacity);
  }

  /** Return a trimmed copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private ensure(extra: number) {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
  }

  writeByte(b: number) {
    this.ensure(1);
    this.buf[this.pos++] = b & 0xff;
  }

  writeBytes(bytes: Uint8Array) {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  private flushScratch(n: number) {
    this.ensure(n);
    for (let i = 0; i < n; i++) {
      this.buf[this.pos++] = scratchU8[i];
    }
  }

  writeUint16(val: number) {
    scratchDV.setUint16(0, val);
    this.flushScratch(2);
  }

  writeUint32(val: number) {
    scratchDV.setUint32(0, val);
    this.flushScratch(4);
  }

  writeBigUint64(val: bigint) {
    scratchDV.setBigUint64(0, val);
    this.flushScratch(8);
  }

  writeBigInt64(val: bigint) {
    scratchDV.setBigInt64(0, val);
    this.flushScratch(8);
  }

  writeFloat32(val: number) {
    scratchDV.setFloat32(0, val);
    this.flushScratch(4);
  }

  writeFloat64(val: number) {
    scratchDV.setFloat64(0, val);
    this.flushScratch(8);
  }
}

// ── Packer ──────────────────────────────────────────────────────────────────

function packUnsigned(out: GrowableBuffer, n: bigint) {
  if (n < 0x80n) {
    out.writeByte(Number(n));
  } else if (n <= 0xffn) {
    out.writeByte(FORMAT.UINT8);
    out.writeByte(Number(n));
  } else if (n <= 0xffffn) {
    out.writeByte(FORMAT.UINT16);
    out.writeUint16(Number(n));
  } else if (n <= 0xffffffffn) {
    out.writeByte(FORMAT.UINT32);
    out.writeUint32(Number(n));
  } else {
    out.writeByte(FORMAT.UINT64);
    out.writeBigUint64(n);
  }
}

function packNegative(out: GrowableBuffer, n: bigint) {
  if (n >= -32n) {
    out.writeByte(0xe0 | (Number(n) + 32));
  } else if (n >= -0x80n) {
    out.writeByte(FORMAT.INT8);
    out.writeByte(Number(n));
  } else if (n >= -0x8000n) {
    out.writeByte(FORMAT.INT16);
    out.writeUint16(Number(n) & 0xffff);
  } else if (n >= -0x80000000n) {
    out.writeByte(FORMAT.INT32);
    out.writeUint32(Number(n) >>> 0);
  } else {
    out.writeByte(FORMAT.INT64);
    out.writeBigInt64(n);
  }
}

function packLength(out: GrowableBuffer, length: number, fix: number, fixMax: number, f8: number | null, f16: number, f32: number) {
  if (length <= fixMax) {
    out.writeByte(fix | length);
  } else if (f8 !== null && length <= 0xff) {
    out.writeByte(f8);
    out.writeByte(length);
  } else if (length <= 0xffff) {
    out.writeByte(f16);
    out.writeUint16(length);
  } else {
    out.writeByte(f32);
    out.writeUint32(length);
  }
}

function packBinaryHeader(out: GrowableBuffer, length: number) {
  if (length <= 0xff) {
    out.writeByte(FORMAT.BIN8);
    out.writeByte(length);
  } else if (length <= 0xffff) {
    out.writeByte(FORMAT.BIN16);
    out.writeUint16(length);
  } else {
    out.writeByte(FORMAT.BIN32);
    out.writeUint32(length);
  }
}

const FIXEXT: Record<number, number> = {
  1: FORMAT.FIXEXT1,
  2: FORMAT.FIXEXT2,
  4: FORMAT.FIXEXT4,
  8: FORMAT.FIXEXT8,
  16: FORMAT.FIXEXT16,
};

function packExtendedHeader(out: GrowableBuffer, type: number, length: number) {
  const fixed = FIXEXT[length];
  if (fixed !== undefined) {
    out.writeByte(fixed);
  } else if (length <= 0xff) {
    out.writeByte(FORMAT.EXT8);
    out.writeByte(length);
  } else if (length <= 0xffff) {
    out.writeByte(FORMAT.EXT16);
    out.writeUint16(length);
  } else {
    out.writeByte(FORMAT.EXT32);
    out.writeUint32(length);
  }
  out.writeByte(type);
}

function packInto(out: GrowableBuffer, value: MessagePackValue) {
  switch (value.kind) {
    case 'nil':
      out.writeByte(FORMAT.NIL);
      break;
    case 'bool':
      out.writeByte(value.value ? FORMAT.TRUE : FORMAT.FALSE);
      break;
    case 'int':
    case 'uint':
      if (value.value >= 0n) packUnsigned(out, value.value);
      else packNegative(out, value.value);
      break;
    case 'float':
      out.writeByte(FORMAT.FLOAT32);
      out.writeFloat32(value.value);
      break;
    case 'double':
      out.writeByte(FORMAT.FLOAT64);
      out.writeFloat64(value.value);
      break;
    case 'string': {
      const utf8 = sharedTextEncoder.encode(value.value);
      packLength(out, utf8.length, 0xa0, 31, FORMAT.STR8, FORMAT.STR16, FORMAT.STR32);
      out.writeBytes(utf8);
      break;
    }
    case 'binary':
      packBinaryHeader(out, value.value.length);
      out.writeBytes(value.value);
      break;
    case 'extended':
      packExtendedHeader(out, value.type, value.data.length);
      out.writeBytes(value.data);
      break;
    case 'array':
      packLength(out, value.value.length, 0x90, 15, null, FORMAT.ARRAY16, FORMAT.ARRAY32);
      for (const item of value.value) packInto(out, item);
      break;
    case 'map':
      packLength(out, value.value.length, 0x80, 15, null, FORMAT.MAP16, FORMAT.MAP32);
      for (const [k, v] of value.value) {
        packInto(out, k);
        packInto(out, v);
      }
      break;
  }
}

/**
 * Pack a Canonical Value into MessagePack bytes.
 *
 * @example
 * ```ts
 * pack(string('hi')); // → Uint8Array [0xa2, 0x68, 0x69]
 * ```
 */
export function pack(value: MessagePackValue): Uint8Array {
  const out = new GrowableBuffer();
  packInto(out, value);
  return out.toUint8Array();
}
