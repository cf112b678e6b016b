// ============================================================================
// @structpack/core — Mapping Container
// ============================================================================

import { type PathSegment, SUPER } from './coding_path.js';
import { containerValue } from './container_state.js';
import { EncoderUsageError, EncodingError } from './errors.js';
import type { CodingKey, Encoder, MappingContainer, SequenceContainer } from './protocol.js';
import { integerValue, unsignedValue } from './scalars.js';
import { StructureSequenceContainer } from './sequence_container.js';
import { MappingCell, SequenceCell, wireKey } from './storage.js';
import type { Finalizable, StructureEncoder } from './structure_encoder.js';
import type { MessagePackValue } from './value.js';
import { array, binary, bool, double, float, keyIdentity, map, nil, string } from './value.js';

/** Key a super link is stored under when none is given. */
export const SUPER_KEY = 'super';

interface Reserved<C> {
  readonly key: CodingKey;
  readonly cell: C;
}

/**
 * Front-end over a MappingCell. Scalars are stored immediately; nested
 * containers and the super link are written into the cell by finalize().
 * Writing a key twice keeps the last value.
 */
export class StructureMappingContainer<K extends CodingKey = string> implements MappingContainer<K>, Finalizable {
  private readonly encoder: StructureEncoder;
  private readonly cell: MappingCell;
  private readonly nestedSequences = new Map<string, Reserved<SequenceCell>>();
  private readonly nestedMappings = new Map<string, Reserved<MappingCell>>();
  private readonly children: Finalizable[] = [];
  private superLink: StructureEncoder | undefined;
  private superLinkKey: string | undefined;
  private finalized = false;

  constructor(encoder: StructureEncoder, cell: MappingCell) {
    this.encoder = encoder;
    this.cell = cell;
  }

  get codingPath(): PathSegment[] {
    return this.encoder.codingPath;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new EncoderUsageError('Cannot write to a mapping container after it was finalized', this.codingPath);
    }
  }

  private checkKey(key: CodingKey): CodingKey {
    if (typeof key === 'number' && !Number.isSafeInteger(key)) {
      throw new EncoderUsageError(`Mapping key must be a string or a safe integer, got ${key}`, this.codingPath);
    }
    return key;
  }

  private store(key: K, value: MessagePackValue): void {
    this.assertOpen();
    this.encoder.assertCanProceed();
    this.cell.set(this.checkKey(key), value);
  }

  // ---- Scalars ----

  encodeNil(key: K): void {
    this.store(key, nil());
  }

  encodeBool(key: K, value: boolean): void {
    this.store(key, bool(value));
  }

  encodeInt(key: K, value: number | bigint): void {
    this.store(key, integerValue(value, this.encoder.path.extended(this.checkKey(key))));
  }

  encodeUInt(key: K, value: number | bigint): void {
    this.store(key, unsignedValue(value, this.encoder.path.extended(this.checkKey(key))));
  }

  encodeFloat(key: K, value: number): void {
    this.store(key, float(value));
  }

  encodeDouble(key: K, value: number): void {
    this.store(key, double(value));
  }

  encodeString(key: K, value: string): void {
    this.store(key, string(value));
  }

  encodeBinary(key: K, value: Uint8Array): void {
    this.store(key, binary(value));
  }

  encode(key: K, value: unknown): void {
    this.assertOpen();
    this.encoder.assertCanProceed();
    this.encoder.path.withPushed(this.checkKey(key), () => {
      const folded = containerValue(this.encoder.encodeGeneric(value));
      if (folded === undefined) {
        throw new EncodingError('invalidValue', 'Nested value produced no representation', {
          path: this.codingPath,
          value,
        });
      }
      this.cell.set(key, folded);
    });
  }

  encodeIfPresent(key: K, value: unknown): void {
    if (value === undefined) return;
    this.encode(key, value);
  }

  contains(key: K): boolean {
    const id = keyIdentity(wireKey(this.checkKey(key)));
    return (
      this.cell.has(key) ||
      this.nestedSequences.has(id) ||
      this.nestedMappings.has(id) ||
      this.superLinkKey === id
    );
  }

  // ---- Nested containers ----

  nestedSequenceContainer(key: K): SequenceContainer {
    this.assertOpen();
    this.encoder.assertCanProceed();
    const cell = new SequenceCell();
    this.nestedSequences.set(keyIdentity(wireKey(this.checkKey(key))), { key, cell });
    return this.adopt(new StructureSequenceContainer(this.encoder, cell));
  }

  nestedMappingContainer<NK extends CodingKey = string>(key: K): MappingContainer<NK> {
    this.assertOpen();
    this.encoder.assertCanProceed();
    const cell = new MappingCell();
    this.nestedMappings.set(keyIdentity(wireKey(this.checkKey(key))), { key, cell });
    return this.adopt(new StructureMappingContainer<NK>(this.encoder, cell));
  }

  superEncoder(key?: K): Encoder {
    this.assertOpen();
    if (this.superLink) {
      throw new EncoderUsageError('A container can only open one super link', this.codingPath);
    }
    this.encoder.assertCanProceed();
    const target = key === undefined ? SUPER_KEY : this.checkKey(key);
    const link = this.encoder.referencing({ kind: 'key', key: target }, key === undefined ? SUPER : target);
    this.superLink = link;
    this.superLinkKey = keyIdentity(wireKey(target));
    return link;
  }

  private adopt<C extends Finalizable>(child: C): C {
    this.children.push(child);
    return child;
  }

  // ---- Finalization ----

  finalize(): void {
    if (this.finalized) return;
    for (let i = this.children.length - 1; i >= 0; i--) {
      this.children[i].finalize();
    }
    this.finalized = true;

    for (const { key, cell } of this.nestedSequences.values()) {
      this.cell.set(key, array(cell.copy()));
    }
    for (const { key, cell } of this.nestedMappings.values()) {
      this.cell.set(key, map(cell.copy()));
    }
    if (this.superLink) {
      const { value, target } = this.superLink.commit();
      if (target.kind !== 'key') {
        throw new EncoderUsageError('Mapping super link must target a key', this.codingPath);
      }
      this.cell.set(target.key, value);
    }
  }
}
