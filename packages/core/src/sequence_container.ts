// ============================================================================
// @structpack/core — Sequence Container
// ============================================================================
//
// Front-end over a SequenceCell. Scalars are appended immediately. Nested
// containers and the super link reserve the index they were opened at and
// are spliced in by finalize(), in ascending index order, so the output
// order matches the order the writes were issued in.
// ============================================================================

import type { PathSegment } from './coding_path.js';
import { containerValue } from './container_state.js';
import { EncoderUsageError, EncodingError } from './errors.js';
import { StructureMappingContainer } from './mapping_container.js';
import type { CodingKey, Encoder, MappingContainer, SequenceContainer } from './protocol.js';
import { integerValue, unsignedValue } from './scalars.js';
import { MappingCell, SequenceCell } from './storage.js';
import type { Finalizable, StructureEncoder } from './structure_encoder.js';
import type { MessagePackValue } from './value.js';
import { array, binary, bool, double, float, map, nil, string } from './value.js';

export class StructureSequenceContainer implements SequenceContainer, Finalizable {
  private readonly encoder: StructureEncoder;
  private readonly cell: SequenceCell;
  private readonly nestedSequences = new Map<number, SequenceCell>();
  private readonly nestedMappings = new Map<number, MappingCell>();
  private readonly children: Finalizable[] = [];
  private superLink: StructureEncoder | undefined;
  private finalized = false;

  constructor(encoder: StructureEncoder, cell: SequenceCell) {
    this.encoder = encoder;
    this.cell = cell;
  }

  get codingPath(): PathSegment[] {
    return this.encoder.codingPath;
  }

  get count(): number {
    return this.cell.length;
  }

  /** Index the next reservation lands at once everything pending is inserted. */
  private get nextReservedIndex(): number {
    const pending = this.nestedSequences.size + this.nestedMappings.size + (this.superLink ? 1 : 0);
    return this.cell.length + pending;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new EncoderUsageError('Cannot write to a sequence container after it was finalized', this.codingPath);
    }
  }

  private append(value: MessagePackValue): void {
    this.assertOpen();
    this.encoder.assertCanProceed();
    this.cell.append(value);
  }

  // ---- Scalars ----

  encodeNil(): void {
    this.append(nil());
  }

  encodeBool(value: boolean): void {
    this.append(bool(value));
  }

  encodeInt(value: number | bigint): void {
    this.append(integerValue(value, this.encoder.path.extended(this.cell.length)));
  }

  encodeUInt(value: number | bigint): void {
    this.append(unsignedValue(value, this.encoder.path.extended(this.cell.length)));
  }

  encodeFloat(value: number): void {
    this.append(float(value));
  }

  encodeDouble(value: number): void {
    this.append(double(value));
  }

  encodeString(value: string): void {
    this.append(string(value));
  }

  encodeBinary(value: Uint8Array): void {
    this.append(binary(value));
  }

  encode(value: unknown): void {
    this.assertOpen();
    this.encoder.assertCanProceed();
    this.encoder.path.withPushed(this.cell.length, () => {
      const folded = containerValue(this.encoder.encodeGeneric(value));
      if (folded === undefined) {
        throw new EncodingError('invalidValue', 'Nested value produced no representation', {
          path: this.codingPath,
          value,
        });
      }
      this.cell.append(folded);
    });
  }

  // ---- Nested containers ----

  nestedSequenceContainer(): SequenceContainer {
    this.assertOpen();
    this.encoder.assertCanProceed();
    const cell = new SequenceCell();
    this.nestedSequences.set(this.nextReservedIndex, cell);
    return this.adopt(new StructureSequenceContainer(this.encoder, cell));
  }

  nestedMappingContainer<NK extends CodingKey = string>(): MappingContainer<NK> {
    this.assertOpen();
    this.encoder.assertCanProceed();
    const cell = new MappingCell();
    this.nestedMappings.set(this.nextReservedIndex, cell);
    return this.adopt(new StructureMappingContainer<NK>(this.encoder, cell));
  }

  superEncoder(): Encoder {
    this.assertOpen();
    if (this.superLink) {
      throw new EncoderUsageError('A container can only open one super link', this.codingPath);
    }
    this.encoder.assertCanProceed();
    const index = this.nextReservedIndex;
    const link = this.encoder.referencing({ kind: 'index', index }, index);
    this.superLink = link;
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

    const pending: Array<[number, MessagePackValue]> = [];
    for (const [index, cell] of this.nestedSequences) {
      pending.push([index, array(cell.copy())]);
    }
    for (const [index, cell] of this.nestedMappings) {
      pending.push([index, map(cell.copy())]);
    }
    if (this.superLink) {
      const { value, target } = this.superLink.commit();
      if (target.kind !== 'index') {
        throw new EncoderUsageError('Sequence super link must target an index', this.codingPath);
      }
      pending.push([target.index, value]);
    }

    pending.sort((a, b) => a[0] - b[0]);
    for (const [index, value] of pending) {
      this.cell.insert(value, index);
    }
  }
}
