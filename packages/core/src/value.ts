// ============================================================================
// @structpack/core — Canonical Value Model
// ============================================================================
//
// One node of the MessagePack value tree. The structure encoder only ever
// produces these; turning them into bytes is the packer's job.
//
// Integers are held as bigint so the full int64/uint64 range survives.
// `int` and `uint` holding the same number compare equal: the tag records
// which wire family a producer asked for, not a different value.
// ============================================================================

/** A `[key, value]` pair of a MessagePack map. */
export type MessagePackEntry = readonly [MessagePackValue, MessagePackValue];

/** A MessagePack value tagged by `kind`. */
export type MessagePackValue =
  | { readonly kind: 'nil' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'uint'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'double'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'binary'; readonly value: Uint8Array }
  | { readonly kind: 'array'; readonly value: readonly MessagePackValue[] }
  | { readonly kind: 'map'; readonly value: readonly MessagePackEntry[] }
  | { readonly kind: 'extended'; readonly type: number; readonly data: Uint8Array };

/** The `kind` tags of {@link MessagePackValue}. */
export type MessagePackKind = MessagePackValue['kind'];

// ---- Integer ranges ----

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

function toBigInt(value: number | bigint, label: string): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isInteger(value)) {
    throw new RangeError(`${label} requires an integer, got ${value}`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${label} cannot represent ${value} exactly; pass a bigint instead`);
  }
  return BigInt(value);
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

const NIL: MessagePackValue = Object.freeze({ kind: 'nil' });

export function nil(): MessagePackValue {
  return NIL;
}

export function bool(value: boolean): MessagePackValue {
  return { kind: 'bool', value };
}

/** Signed 64-bit integer. Throws `RangeError` outside [-2^63, 2^63-1]. */
export function int(value: number | bigint): MessagePackValue {
  const n = toBigInt(value, 'int');
  if (n < INT64_MIN || n > INT64_MAX) {
    throw new RangeError(`int out of range: ${n}`);
  }
  return { kind: 'int', value: n };
}

/** Unsigned 64-bit integer. Throws `RangeError` outside [0, 2^64-1]. */
export function uint(value: number | bigint): MessagePackValue {
  const n = toBigInt(value, 'uint');
  if (n < 0n || n > UINT64_MAX) {
    throw new RangeError(`uint out of range: ${n}`);
  }
  return { kind: 'uint', value: n };
}

/**
 * Integer with the tag chosen from its magnitude: `int` up to 2^63-1,
 * `uint` from 2^63 to 2^64-1. Anything else is a `RangeError`.
 */
export function integer(value: number | bigint): MessagePackValue {
  const n = toBigInt(value, 'integer');
  return n > INT64_MAX ? uint(n) : int(n);
}

/** Single-precision float. The value is rounded with `Math.fround`. */
export function float(value: number): MessagePackValue {
  return { kind: 'float', value: Math.fround(value) };
}

export function double(value: number): MessagePackValue {
  return { kind: 'double', value };
}

export function string(value: string): MessagePackValue {
  return { kind: 'string', value };
}

export function binary(value: Uint8Array): MessagePackValue {
  return { kind: 'binary', value };
}

export function array(value: readonly MessagePackValue[]): MessagePackValue {
  return { kind: 'array', value };
}

/**
 * Map from entries. Later entries with a key equal to an earlier one replace
 * its value in place.
 */
export function map(entries: Iterable<MessagePackEntry>): MessagePackValue {
  const index = new Map<string, number>();
  const out: MessagePackEntry[] = [];
  for (const [key, value] of entries) {
    const id = keyIdentity(key);
    const at = index.get(id);
    if (at === undefined) {
      index.set(id, out.length);
      out.push([key, value]);
    } else {
      out[at] = [out[at][0], value];
    }
  }
  return { kind: 'map', value: out };
}

/** Application-defined extension value. `type` must fit in a signed byte. */
export function extended(type: number, data: Uint8Array): MessagePackValue {
  if (!Number.isInteger(type) || type < -128 || type > 127) {
    throw new RangeError(`extension type must be in -128..127, got ${type}`);
  }
  return { kind: 'extended', type, data };
}

// ---------------------------------------------------------------------------
// Identity & Equality
// ---------------------------------------------------------------------------

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function bytesHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

function numberIdentity(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (Object.is(n, -0)) return '-0';
  return String(n);
}

/**
 * Stable string identity of a value, used to index map keys. Two values have
 * the same identity exactly when {@link equals} holds for them.
 */
export function keyIdentity(value: MessagePackValue): string {
  switch (value.kind) {
    case 'nil':
      return 'n';
    case 'bool':
      return value.value ? 'T' : 'F';
    case 'int':
    case 'uint':
      return `i:${value.value}`;
    case 'float':
      return `f:${numberIdentity(value.value)}`;
    case 'double':
      return `d:${numberIdentity(value.value)}`;
    case 'string':
      return `s:${JSON.stringify(value.value)}`;
    case 'binary':
      return `b:${bytesHex(value.value)}`;
    case 'extended':
      return `e:${value.type}:${bytesHex(value.data)}`;
    case 'array':
      return `a:[${value.value.map(keyIdentity).join(',')}]`;
    case 'map': {
      const parts = value.value.map(([k, v]) => `${keyIdentity(k)}=${keyIdentity(v)}`).sort();
      return `m:{${parts.join(',')}}`;
    }
  }
}

/**
 * Structural equality. Maps are compared as unordered sets of entries.
 */
export function equals(a: MessagePackValue, b: MessagePackValue): boolean {
  switch (a.kind) {
    case 'nil':
      return b.kind === 'nil';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'int':
    case 'uint':
      return (b.kind === 'int' || b.kind === 'uint') && a.value === b.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'double':
      return b.kind === 'double' && Object.is(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'binary':
      return b.kind === 'binary' && bytesEqual(a.value, b.value);
    case 'extended':
      return b.kind === 'extended' && a.type === b.type && bytesEqual(a.data, b.data);
    case 'array': {
      if (b.kind !== 'array' || a.value.length !== b.value.length) return false;
      const other = b.value;
      return a.value.every((item, i) => equals(item, other[i]));
    }
    case 'map': {
      if (b.kind !== 'map' || a.value.length !== b.value.length) return false;
      const lookup = new Map<string, MessagePackValue>();
      for (const [k, v] of b.value) lookup.set(keyIdentity(k), v);
      return a.value.every(([k, v]) => {
        const match = lookup.get(keyIdentity(k));
        return match !== undefined && equals(v, match);
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

/** Look up a map entry by key. Returns `undefined` for non-maps and missing keys. */
export function lookup(value: MessagePackValue, key: MessagePackValue | string): MessagePackValue | undefined {
  if (value.kind !== 'map') return undefined;
  const id = keyIdentity(typeof key === 'string' ? string(key) : key);
  for (const [k, v] of value.value) {
    if (keyIdentity(k) === id) return v;
  }
  return undefined;
}

/** Element count of an array or map, `undefined` for scalars. */
export function count(value: MessagePackValue): number | undefined {
  if (value.kind === 'array' || value.kind === 'map') return value.value.length;
  return undefined;
}

/**
 * Human-readable rendering for diagnostics, e.g. `{"a": 1, "b": [nil, 2.5f]}`.
 */
export function describeValue(value: MessagePackValue): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'bool':
      return String(value.value);
    case 'int':
      return String(value.value);
    case 'uint':
      return `${value.value}u`;
    case 'float':
      return `${numberIdentity(value.value)}f`;
    case 'double':
      return numberIdentity(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'binary':
      return `<${bytesHex(value.value)}>`;
    case 'extended':
      return `ext(${value.type}, <${bytesHex(value.data)}>)`;
    case 'array':
      return `[${value.value.map(describeValue).join(', ')}]`;
    case 'map':
      return `{${value.value.map(([k, v]) => `${describeValue(k)}: ${describeValue(v)}`).join(', ')}}`;
  }
}
