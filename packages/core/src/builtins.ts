// ============================================================================
// @structpack/core — Built-in Self-Descriptions
// ============================================================================
//
// How JavaScript values without an `encode` method describe themselves.
// Values with one always take precedence.
// ============================================================================

import { EncodingError, wrapForeignError } from './errors.js';
import type { CodingKey, Encoder } from './protocol.js';
import { isEncodable } from './protocol.js';

/**
 * Describe `value` into `encoder`, requesting exactly one container.
 *
 * Dates outside of a date strategy describe themselves as epoch
 * milliseconds, URLs as their `href` and `Uint8Array`s as binary.
 */
export function describeInto(value: unknown, encoder: Encoder): void {
  if (isEncodable(value)) {
    try {
      value.encode(encoder);
    } catch (err) {
      throw wrapForeignError(err, encoder.codingPath, value);
    }
    return;
  }

  switch (typeof value) {
    case 'undefined':
      encoder.singleValueContainer().encodeNil();
      return;
    case 'boolean':
      encoder.singleValueContainer().encodeBool(value);
      return;
    case 'number':
      if (Number.isSafeInteger(value)) {
        encoder.singleValueContainer().encodeInt(value);
      } else {
        encoder.singleValueContainer().encodeDouble(value);
      }
      return;
    case 'bigint':
      encoder.singleValueContainer().encodeInt(value);
      return;
    case 'string':
      encoder.singleValueContainer().encodeString(value);
      return;
    case 'function':
    case 'symbol':
      throw unsupported(value, encoder, typeof value);
    case 'object':
      describeObject(value, encoder);
      return;
  }
}

function describeObject(value: object | null, encoder: Encoder): void {
  if (value === null) {
    encoder.singleValueContainer().encodeNil();
    return;
  }

  if (value instanceof Date) {
    encoder.singleValueContainer().encodeDouble(value.getTime());
    return;
  }
  if (value instanceof URL) {
    encoder.singleValueContainer().encodeString(value.href);
    return;
  }
  if (value instanceof Uint8Array) {
    encoder.singleValueContainer().encodeBinary(value);
    return;
  }

  if (Array.isArray(value)) {
    const container = encoder.sequenceContainer();
    // Index loop so holes are visited and come out as nil.
    for (let i = 0; i < value.length; i++) {
      container.encode(value[i]);
    }
    return;
  }

  if (value instanceof Set) {
    const container = encoder.sequenceContainer();
    for (const item of value) {
      container.encode(item);
    }
    return;
  }

  if (value instanceof Map) {
    const container = encoder.mappingContainer<CodingKey>();
    for (const [key, item] of value) {
      container.encode(mapKey(key, encoder), item);
    }
    return;
  }

  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    throw unsupported(value, encoder, constructorName(value));
  }

  if (!isPlainObject(value)) {
    throw unsupported(value, encoder, constructorName(value));
  }

  const container = encoder.mappingContainer();
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    container.encode(key, item);
  }
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function mapKey(key: unknown, encoder: Encoder): CodingKey {
  if (typeof key === 'number' && Number.isSafeInteger(key)) return key;
  if (typeof key === 'string' || typeof key === 'number' || typeof key === 'bigint' || typeof key === 'boolean') {
    return String(key);
  }
  throw new EncodingError('invalidValue', `Map key of type ${typeof key} is not supported`, {
    path: encoder.codingPath,
    value: key,
  });
}

function unsupported(value: unknown, encoder: Encoder, typeName: string): EncodingError {
  return new EncodingError('invalidValue', `Value of type ${typeName} is not encodable`, {
    path: encoder.codingPath,
    value,
  });
}
