import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { EncoderUsageError } from '../errors.js';
import { MessagePackEncoder, encode } from '../message_pack_encoder.js';
import type { Encodable, Encoder } from '../protocol.js';
import { unpack } from '../unpack.js';
import {
  INT64_MIN,
  UINT64_MAX,
  type MessagePackValue,
  array,
  binary,
  bool,
  double,
  equals,
  int,
  integer,
  nil,
  string,
} from '../value.js';

// ============================================================================
// Structural Encoder Property-Based Tests
// ============================================================================

const encodable = (fn: (encoder: Encoder) => void): Encodable => ({ encode: fn });

/** A scalar paired with the Canonical Value it should encode to. */
const scalar: fc.Arbitrary<[unknown, MessagePackValue]> = fc.oneof(
  fc.constant<[unknown, MessagePackValue]>([null, nil()]),
  fc.boolean().map((b): [unknown, MessagePackValue] => [b, bool(b)]),
  fc.bigInt({ min: INT64_MIN, max: UINT64_MAX }).map((n): [unknown, MessagePackValue] => [n, integer(n)]),
  fc
    .double()
    .map((n): [unknown, MessagePackValue] => [n, Number.isSafeInteger(n) ? int(n) : double(n)]),
  fc.fullUnicodeString().map((s): [unknown, MessagePackValue] => [s, string(s)]),
  fc.uint8Array({ maxLength: 64 }).map((b): [unknown, MessagePackValue] => [b, binary(b)]),
);

type WriteMode = 'direct' | 'detached' | 'nested';

describe('encoder properties', () => {
  it('round-trips every scalar to its direct wrap', () => {
    fc.assert(
      fc.property(scalar, ([input, expected]) => {
        const { value, remainder } = unpack(encode(input));
        expect(remainder.length).toBe(0);
        expect(equals(value, expected)).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it('keeps sequence length and order whatever the write path', () => {
    const element = fc.tuple(fc.constantFrom<WriteMode>('direct', 'detached', 'nested'), fc.integer());
    fc.assert(
      fc.property(fc.array(element, { maxLength: 30 }), (elements) => {
        const expected: MessagePackValue[] = [];
        const value = encodable((encoder) => {
          const c = encoder.sequenceContainer();
          const late: Array<() => void> = [];
          for (const [mode, n] of elements) {
            if (mode === 'direct') {
              c.encodeInt(n);
              expected.push(int(n));
            } else if (mode === 'detached') {
              c.encode(n);
              expected.push(int(n));
            } else {
              const nested = c.nestedSequenceContainer();
              late.push(() => nested.encodeInt(n));
              expected.push(array([int(n)]));
            }
          }
          // Complete nested containers in reverse order of opening.
          for (const write of late.reverse()) write();
        });

        const result = new MessagePackEncoder().encodeToValue(value);
        expect(result.kind).toBe('array');
        expect(equals(result, array(expected))).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it('fails the whole sequence when any element produces nothing', () => {
    const empty = encodable(() => undefined);
    fc.assert(
      fc.property(fc.array(fc.integer(), { maxLength: 10 }), fc.nat(), (items, at) => {
        const position = at % (items.length + 1);
        const values: unknown[] = [...items];
        values.splice(position, 0, empty);
        expect(() => encode(values)).toThrow(`Nested value produced no representation (at $[${position}])`);
      }),
      { numRuns: 100 },
    );
  });

  it('accepts one super link per container and rejects a second', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), fc.boolean(), (payload, twice) => {
        const value = encodable((encoder) => {
          const c = encoder.mappingContainer();
          c.superEncoder().singleValueContainer().encodeString(payload);
          if (twice) c.superEncoder('again');
        });
        if (twice) {
          expect(() => encode(value)).toThrow(EncoderUsageError);
        } else {
          expect(encode(value).length).toBeGreaterThan(0);
        }
      }),
      { numRuns: 100 },
    );
  });

  it('produces identical bytes when encoding the same value twice', () => {
    fc.assert(
      fc.property(fc.jsonValue({ maxDepth: 4 }), (value) => {
        const encoder = new MessagePackEncoder();
        expect(encoder.encode(value)).toEqual(encoder.encode(value));
      }),
      { numRuns: 200 },
    );
  });
});
