import { Unpackr } from 'msgpackr';
import { describe, expect, it } from 'vitest';
import { millisecondsSince1970 } from '../date_strategy.js';
import { MessagePackEncoder, encode } from '../message_pack_encoder.js';
import type { Encodable, Encoder } from '../protocol.js';

// An independent MessagePack implementation must read what we write.
const unpackr = new Unpackr({ mapsAsObjects: true, useRecords: false });

class Account implements Encodable {
  constructor(
    readonly id: number,
    readonly owner: string,
  ) {}

  encode(encoder: Encoder): void {
    const c = encoder.mappingContainer<'id' | 'owner'>();
    c.encodeInt('id', this.id);
    c.encodeString('owner', this.owner);
  }
}

class SavingsAccount extends Account {
  constructor(
    id: number,
    owner: string,
    readonly rate: number,
  ) {
    super(id, owner);
  }

  encode(encoder: Encoder): void {
    const c = encoder.mappingContainer<'rate'>();
    c.encodeDouble('rate', this.rate);
    super.encode(c.superEncoder());
  }
}

describe('interoperability', () => {
  it('plain data decodes to the same data', () => {
    const data = {
      name: 'widget',
      count: 300,
      delta: -70000,
      ratio: 0.25,
      tags: ['a', 'b'],
      nested: { ok: true, none: null },
    };
    expect(unpackr.unpack(encode(data))).toEqual(data);
  });

  it('super links decode as a nested "super" map', () => {
    const bytes = encode(new SavingsAccount(7, 'test-user', 1.5));
    expect(unpackr.unpack(bytes)).toEqual({ rate: 1.5, super: { id: 7, owner: 'test-user' } });
  });

  it('long strings and arrays use the wide headers', () => {
    const data = { text: 'x'.repeat(70_000), items: Array.from({ length: 20 }, (_, i) => i) };
    expect(unpackr.unpack(encode(data))).toEqual(data);
  });

  it('binary decodes to the same bytes', () => {
    const decoded: unknown = unpackr.unpack(encode(new Uint8Array([1, 2, 250])));
    expect(decoded).toBeInstanceOf(Uint8Array);
    if (decoded instanceof Uint8Array) expect(Array.from(decoded)).toEqual([1, 2, 250]);
  });

  it('dates encode as numbers', () => {
    const encoder = new MessagePackEncoder({ dateEncodingStrategy: millisecondsSince1970() });
    expect(unpackr.unpack(encoder.encode({ at: new Date(69_000_000) }))).toEqual({ at: 69_000_000 });
  });
});
