import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError, EncodingError } from '../errors.js';
import { type LogEntry, onLog, setLogLevel } from '../logger.js';
import { MessagePackEncoder, encode } from '../message_pack_encoder.js';
import type { Encodable, Encoder } from '../protocol.js';
import { array, double, int, map, nil, string, uint } from '../value.js';

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

describe('MessagePackEncoder', () => {
  describe('plain values', () => {
    it('encodes scalars', () => {
      expect(hex(encode(null))).toBe('c0');
      expect(hex(encode(undefined))).toBe('c0');
      expect(hex(encode(true))).toBe('c3');
      expect(hex(encode(69))).toBe('45');
      expect(hex(encode(-105))).toBe('d097');
      expect(hex(encode(1.5))).toBe('cb3ff8000000000000');
      expect(hex(encode('hi'))).toBe('a26869');
    });

    it('encodes bigint above int64 max with the unsigned tag', () => {
      const encoder = new MessagePackEncoder();
      expect(encoder.encodeToValue(10n ** 19n)).toEqual(uint(10n ** 19n));
      expect(hex(encoder.encode(10n ** 19n))).toBe('cf8ac7230489e80000');
    });

    it('rejects integers outside the 64-bit range', () => {
      expect(() => encode(2n ** 64n)).toThrow(EncodingError);
      expect(() => encode(-(2n ** 63n) - 1n)).toThrow('int out of range');
    });

    it('encodes plain objects, skipping undefined fields', () => {
      expect(hex(encode({ a: 1, b: [true, null], c: undefined }))).toBe('82a16101a16292c3c0');
    });

    it('encodes array holes as nil', () => {
      const sparse: unknown[] = [];
      sparse[2] = 1;
      expect(hex(encode(sparse))).toBe('93c0c001');
    });

    it('encodes Map with integer and string keys', () => {
      const value = new Map<unknown, unknown>([
        [1, 'x'],
        ['k', 2],
      ]);
      expect(hex(encode(value))).toBe('8201a178a16b02');
    });

    it('encodes Set as a sequence', () => {
      expect(hex(encode(new Set([1, 2])))).toBe('920102');
    });

    it('encodes URL as its string form', () => {
      const url = new URL('msgpack', 'https://example.com');
      expect(new MessagePackEncoder().encodeToValue(url)).toEqual(string('https://example.com/msgpack'));
      expect(new MessagePackEncoder().encodeToValue({ link: url })).toEqual(
        map([[string('link'), string('https://example.com/msgpack')]]),
      );
    });

    it('encodes Uint8Array as binary', () => {
      expect(hex(encode(new Uint8Array([1, 2, 3])))).toBe('c403010203');
      expect(hex(encode([new Uint8Array([9])]))).toBe('91c40109');
    });

    it('rejects functions', () => {
      expect(() => encode({ fn: () => 1 })).toThrow('Value of type function is not encodable (at $.fn)');
    });

    it('rejects class instances that do not describe themselves', () => {
      class Opaque {
        readonly secret = 'test-secret';
      }
      expect(() => encode([new Opaque()])).toThrow('Value of type Opaque is not encodable (at $[0])');
    });

    it('rejects other typed arrays', () => {
      expect(() => encode(new Float32Array(2))).toThrow('Value of type Float32Array is not encodable');
    });
  });

  describe('self-describing values', () => {
    class Point implements Encodable {
      constructor(
        readonly x: number,
        readonly y: number,
      ) {}

      encode(encoder: Encoder): void {
        const c = encoder.mappingContainer<'x' | 'y'>();
        c.encodeInt('x', this.x);
        c.encodeInt('y', this.y);
      }
    }

    it('uses the encode method', () => {
      expect(hex(encode(new Point(1, -1)))).toBe('82a17801a179ff');
    });

    it('prefers encode over the built-in description', () => {
      const value = Object.assign([1, 2, 3], {
        encode(encoder: Encoder) {
          encoder.singleValueContainer().encodeString('custom');
        },
      });
      expect(new MessagePackEncoder().encodeToValue(value)).toEqual(string('custom'));
    });

    it('exposes userInfo to every node', () => {
      class Versioned implements Encodable {
        encode(encoder: Encoder): void {
          const version = encoder.userInfo.get('version');
          encoder.singleValueContainer().encodeString(typeof version === 'string' ? version : 'none');
        }
      }
      const encoder = new MessagePackEncoder({ userInfo: { version: 'v2' } });
      expect(encoder.userInfo.get('version')).toBe('v2');
      expect(encoder.encodeToValue({ inner: [new Versioned()] })).toEqual(
        map([[string('inner'), array([string('v2')])]]),
      );
      expect(new MessagePackEncoder().encodeToValue(new Versioned())).toEqual(string('none'));
    });

    it('wraps errors thrown by application code with the path', () => {
      class Broken implements Encodable {
        encode(): void {
          throw new Error('nope');
        }
      }
      let caught: unknown;
      try {
        encode({ x: new Broken() });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(EncodingError);
      if (!(caught instanceof EncodingError)) return;
      expect(caught.reason).toBe('transformFailed');
      expect(caught.message).toBe('Value description failed: nope (at $.x)');
      expect(caught.formattedPath).toBe('$.x');
      expect(caught.cause).toBeInstanceOf(Error);
    });

    it('fails when the top-level value produces nothing', () => {
      const empty: Encodable = { encode: () => undefined };
      expect(() => encode(empty)).toThrow(
        new EncodingError('invalidValue', 'Top-level value did not encode any values.', { path: [] }),
      );
    });

    it('fails when a nested value produces nothing', () => {
      const empty: Encodable = { encode: () => undefined };
      expect(() => encode([1, empty])).toThrow('Nested value produced no representation (at $[1])');
      expect(() => encode({ k: empty })).toThrow('Nested value produced no representation (at $.k)');
    });
  });

  describe('maxDepth', () => {
    it('allows nesting up to the limit', () => {
      const encoder = new MessagePackEncoder({ maxDepth: 3 });
      expect(encoder.encodeToValue({ a: { b: { c: 1 } } })).toEqual(
        map([[string('a'), map([[string('b'), map([[string('c'), int(1)]])]])]]),
      );
    });

    it('fails past the limit with the path reached', () => {
      const encoder = new MessagePackEncoder({ maxDepth: 3 });
      expect(() => encoder.encodeToValue({ a: { b: { c: { d: 1 } } } })).toThrow(
        'Maximum nesting depth of 3 exceeded (at $.a.b.c.d)',
      );
    });

    it('turns cycles into an encoding error', () => {
      const node: Record<string, unknown> = { name: 'loop' };
      node.self = node;
      expect(() => encode(node, { maxDepth: 40 })).toThrow(EncodingError);
    });
  });

  it('keeps no state between calls', () => {
    const encoder = new MessagePackEncoder();
    const first = encoder.encodeToValue([1, 2]);
    const second = encoder.encodeToValue([1, 2]);
    expect(first).toEqual(second);
    expect(encoder.encodeToValue(null)).toEqual(nil());
  });

  it('encodes non-integral numbers as double', () => {
    expect(new MessagePackEncoder().encodeToValue(0.5)).toEqual(double(0.5));
    expect(new MessagePackEncoder().encodeToValue(2 ** 60)).toEqual(double(2 ** 60));
  });
});

describe('encoder options', () => {
  it('defaults to deferred dates and an empty userInfo', () => {
    const encoder = new MessagePackEncoder();
    expect(encoder.dateEncodingStrategy).toEqual({ kind: 'deferred' });
    expect(encoder.userInfo.size).toBe(0);
  });

  it('accepts userInfo as a Map', () => {
    const encoder = new MessagePackEncoder({ userInfo: new Map([['tenant', 'test-tenant']]) });
    expect(encoder.userInfo.get('tenant')).toBe('test-tenant');
  });

  it('rejects invalid options', () => {
    let caught: unknown;
    try {
      new MessagePackEncoder({ maxDepth: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0].startsWith('maxDepth: ')).toBe(true);
  });

  it('rejects a non-integer maxDepth', () => {
    expect(() => encode(null, { maxDepth: 2.5 })).toThrow(
      'Invalid encoder options: maxDepth: Expected integer, received float',
    );
  });
});

describe('logging', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('reports each encode at debug level', () => {
    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    setLogLevel('debug');
    encode([1, 2, 3]);
    unsubscribe();

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('debug');
    expect(entries[0].data?.root).toBe('array');
    expect(entries[0].data?.bytes).toBe(4);
  });

  it('reports failures before rethrowing', () => {
    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    setLogLevel('debug');
    expect(() => encode({ bad: Symbol('x') })).toThrow(EncodingError);
    unsubscribe();

    expect(entries.map((e) => e.message)).toEqual(['encode failed at $.bad']);
  });

  it('stays quiet at the default level', () => {
    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    encode('quiet');
    unsubscribe();
    expect(entries).toEqual([]);
  });
});
