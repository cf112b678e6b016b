// ============================================================================
// @structpack/core — Structural Encoder
// ============================================================================
//
// One node of the encoding tree. A value describes itself into a node by
// requesting one container; nested values get detached child nodes whose
// results are folded back by the parent. A referencing node is a detached
// node that also knows where in its owner its result belongs (the super
// link of a container).
// ============================================================================

import { describeInto } from './builtins.js';
import { CodingPath, type PathSegment, formatPath } from './coding_path.js';
import type { ResolvedEncoderOptions } from './config.js';
import { type ContainerState, UNSET, containerValue } from './container_state.js';
import { resolveDate } from './date_strategy.js';
import { EncoderUsageError, EncodingError } from './errors.js';
import { logCaughtFailure } from './logger.js';
import { StructureMappingContainer } from './mapping_container.js';
import type {
  CodingKey,
  Encoder,
  MappingContainer,
  SequenceContainer,
  SingleValueContainer,
} from './protocol.js';
import { integerValue, unsignedValue } from './scalars.js';
import { StructureSequenceContainer } from './sequence_container.js';
import { MappingCell, SequenceCell } from './storage.js';
import type { MessagePackValue } from './value.js';
import { binary, bool, double, float, nil, string } from './value.js';

/** Where a referencing encoder's value goes in its owner's container. */
export type SuperTarget =
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'key'; readonly key: CodingKey };

/** The link from a referencing encoder back to the container it writes into. */
export interface SuperReference {
  readonly owner: StructureEncoder;
  readonly target: SuperTarget;
  /** Path segment this encoder starts with. */
  readonly segment: PathSegment;
}

/** Something that flushes pending writes into its storage cell once. */
export interface Finalizable {
  finalize(): void;
}

export interface StructureEncoderInit {
  /** Full path of the encoder this one was detached from. */
  basePath?: readonly PathSegment[];
  reference?: SuperReference;
}

export class StructureEncoder implements Encoder, SingleValueContainer {
  readonly options: ResolvedEncoderOptions;
  readonly path: CodingPath;

  private state: ContainerState = UNSET;
  private readonly reference: SuperReference | undefined;
  private readonly containers: Finalizable[] = [];
  private committed = false;

  constructor(options: ResolvedEncoderOptions, init: StructureEncoderInit = {}) {
    this.options = options;
    this.reference = init.reference;
    this.path = init.reference
      ? new CodingPath(init.reference.owner.path.segments, init.reference.segment)
      : new CodingPath(init.basePath);
  }

  get codingPath(): PathSegment[] {
    return this.path.segments;
  }

  get userInfo(): ReadonlyMap<string, unknown> {
    return this.options.userInfo;
  }

  // -------------------------------------------------------------------------
  // Failure and usage checks
  // -------------------------------------------------------------------------

  /**
   * True when a segment pushed on this node was never popped, meaning a
   * nested encode failed and its error was caught by application code.
   */
  get hasFailure(): boolean {
    if (this.reference) {
      return this.path.depth !== this.reference.owner.path.depth + 1;
    }
    return this.path.ownDepth !== 0;
  }

  assertCanProceed(): void {
    if (this.hasFailure) {
      throw new EncoderUsageError(
        'Cannot continue encoding after a nested encode failed',
        this.codingPath,
      );
    }
  }

  /**
   * Reject a node that returned normally while a caught nested failure is
   * still on its path.
   */
  private static assertSettled(node: StructureEncoder): void {
    if (node.hasFailure) {
      logCaughtFailure(formatPath(node.codingPath));
      throw new EncoderUsageError('Encoding returned after a nested encode failed', node.codingPath);
    }
  }

  private assertCanRequestContainer(): void {
    if (this.state.kind !== 'unset') {
      throw new EncoderUsageError(
        'Attempt to request multiple containers for the same value',
        this.codingPath,
      );
    }
    this.assertCanProceed();
    this.assertWithinDepth();
  }

  private assertCanEncodeSingleValue(): void {
    switch (this.state.kind) {
      case 'unset':
        break;
      case 'single':
        throw new EncoderUsageError(
          'Attempt to encode multiple values in a single value container',
          this.codingPath,
        );
      case 'sequence':
      case 'mapping':
        throw new EncoderUsageError(
          'Attempt to encode a single value into an encoder that already holds a container',
          this.codingPath,
        );
    }
    this.assertCanProceed();
  }

  private assertWithinDepth(): void {
    if (this.path.depth > this.options.maxDepth) {
      throw new EncodingError(
        'invalidValue',
        `Maximum nesting depth of ${this.options.maxDepth} exceeded`,
        { path: this.codingPath },
      );
    }
  }

  // -------------------------------------------------------------------------
  // Container requests
  // -------------------------------------------------------------------------

  sequenceContainer(): SequenceContainer {
    this.assertCanRequestContainer();
    const cell = new SequenceCell();
    this.state = { kind: 'sequence', cell };
    return this.track(new StructureSequenceContainer(this, cell));
  }

  mappingContainer<K extends CodingKey = string>(): MappingContainer<K> {
    this.assertCanRequestContainer();
    const cell = new MappingCell();
    this.state = { kind: 'mapping', cell };
    return this.track(new StructureMappingContainer<K>(this, cell));
  }

  singleValueContainer(): SingleValueContainer {
    this.assertCanRequestContainer();
    return this;
  }

  /** Register a container front-end to be finalized by {@link finish}. */
  track<C extends Finalizable>(container: C): C {
    this.containers.push(container);
    return container;
  }

  // -------------------------------------------------------------------------
  // Single value writes
  // -------------------------------------------------------------------------

  private store(value: MessagePackValue): void {
    this.state = { kind: 'single', value };
  }

  encodeNil(): void {
    this.assertCanEncodeSingleValue();
    this.store(nil());
  }

  encodeBool(value: boolean): void {
    this.assertCanEncodeSingleValue();
    this.store(bool(value));
  }

  encodeInt(value: number | bigint): void {
    this.assertCanEncodeSingleValue();
    this.store(integerValue(value, this.codingPath));
  }

  encodeUInt(value: number | bigint): void {
    this.assertCanEncodeSingleValue();
    this.store(unsignedValue(value, this.codingPath));
  }

  encodeFloat(value: number): void {
    this.assertCanEncodeSingleValue();
    this.store(float(value));
  }

  encodeDouble(value: number): void {
    this.assertCanEncodeSingleValue();
    this.store(double(value));
  }

  encodeString(value: string): void {
    this.assertCanEncodeSingleValue();
    this.store(string(value));
  }

  encodeBinary(value: Uint8Array): void {
    this.assertCanEncodeSingleValue();
    this.store(binary(value));
  }

  encode(value: unknown): void {
    this.assertCanEncodeSingleValue();
    const result = this.encodeGeneric(value);
    if (result.kind !== 'unset') this.state = result;
  }

  // -------------------------------------------------------------------------
  // Recursion
  // -------------------------------------------------------------------------

  /**
   * Encode `value` into a fresh state, applying the Date, URL and binary
   * special cases before falling back to the value's own description.
   */
  encodeGeneric(value: unknown): ContainerState {
    if (value instanceof Date) {
      const resolved = resolveDate(value, this.options.dateEncodingStrategy, {
        codingPath: this.codingPath,
        userInfo: this.userInfo,
      });
      if (resolved.kind === 'value') return { kind: 'single', value: resolved.value };
      return this.encodeDetached(resolved.value);
    }
    if (value instanceof URL) {
      return { kind: 'single', value: string(value.href) };
    }
    if (value instanceof Uint8Array) {
      return { kind: 'single', value: binary(value) };
    }
    return this.encodeDetached(value);
  }

  /**
   * Describe `value` into a child encoder whose path starts at this one's,
   * and return what it produced. May be `unset`.
   */
  encodeDetached(value: unknown): ContainerState {
    this.assertWithinDepth();
    const child = new StructureEncoder(this.options, { basePath: this.codingPath });
    describeInto(value, child);
    StructureEncoder.assertSettled(child);
    return child.finish();
  }

  /** Create the encoder behind a container's super link. */
  referencing(target: SuperTarget, segment: PathSegment): StructureEncoder {
    return new StructureEncoder(this.options, { reference: { owner: this, target, segment } });
  }

  /**
   * Encode the top-level value directly into this encoder and return the
   * finished tree.
   */
  encodeRoot(value: unknown): MessagePackValue {
    if (value instanceof Date || value instanceof URL || value instanceof Uint8Array) {
      this.singleValueContainer().encode(value);
    } else {
      describeInto(value, this);
    }
    StructureEncoder.assertSettled(this);

    const result = containerValue(this.finish());
    if (result === undefined) {
      throw new EncodingError('invalidValue', 'Top-level value did not encode any values.', {
        path: this.codingPath,
        value,
      });
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Completion
  // -------------------------------------------------------------------------

  /**
   * Finalize every container requested from this encoder, newest first, and
   * return the resulting state.
   */
  finish(): ContainerState {
    for (let i = this.containers.length - 1; i >= 0; i--) {
      this.containers[i].finalize();
    }
    return this.state;
  }

  /**
   * Hand a referencing encoder's value to its owner. Runs once.
   */
  commit(): { value: MessagePackValue; target: SuperTarget } {
    if (!this.reference) {
      throw new EncoderUsageError('Only a super encoder can commit', this.codingPath);
    }
    if (this.committed) {
      throw new EncoderUsageError('Super encoder already committed', this.codingPath);
    }
    this.committed = true;
    StructureEncoder.assertSettled(this);

    const value = containerValue(this.finish());
    if (value === undefined) {
      throw new EncoderUsageError('Super encoder produced no value', this.codingPath);
    }
    return { value, target: this.reference.target };
  }
}
