// ============================================================================
// @structpack/core — Value Description Protocol
// ============================================================================
//
// A value describes itself once, generically, by requesting exactly one
// container from the encoder it is handed and writing into it. The encoder
// turns those writes into a Canonical Value tree.
// ============================================================================

import type { PathSegment } from './coding_path.js';

/** A key of a mapping container. Numbers are written as integer wire keys. */
export type CodingKey = string | number;

/**
 * A value that knows how to describe itself to an {@link Encoder}.
 *
 * @example
 * ```ts
 * class Point implements Encodable {
 *   constructor(readonly x: number, readonly y: number) {}
 *   encode(encoder: Encoder): void {
 *     const c = encoder.mappingContainer<'x' | 'y'>();
 *     c.encodeDouble('x', this.x);
 *     c.encodeDouble('y', this.y);
 *   }
 * }
 * ```
 */
export interface Encodable {
  encode(encoder: Encoder): void;
}

export function isEncodable(value: unknown): value is Encodable {
  return (
    typeof value === 'object' && value !== null && 'encode' in value && typeof value.encode === 'function'
  );
}

/**
 * The node a value describes itself to. Exactly one container may be
 * requested per encoder.
 */
export interface Encoder {
  /** Where in the value tree this encoder sits. */
  readonly codingPath: readonly PathSegment[];
  /** Application context passed down unchanged from the top-level encoder. */
  readonly userInfo: ReadonlyMap<string, unknown>;

  sequenceContainer(): SequenceContainer;
  mappingContainer<K extends CodingKey = string>(): MappingContainer<K>;
  singleValueContainer(): SingleValueContainer;
}

/**
 * Holds one value. A second write is a usage error.
 */
export interface SingleValueContainer {
  readonly codingPath: readonly PathSegment[];

  encodeNil(): void;
  encodeBool(value: boolean): void;
  /** Integer; values above 2^63-1 are written with the unsigned tag. */
  encodeInt(value: number | bigint): void;
  encodeUInt(value: number | bigint): void;
  /** Single-precision float. */
  encodeFloat(value: number): void;
  encodeDouble(value: number): void;
  encodeString(value: string): void;
  encodeBinary(value: Uint8Array): void;
  /** Any encodable value, including dates, URLs and byte arrays. */
  encode(value: unknown): void;
}

/**
 * An ordered list under construction.
 */
export interface SequenceContainer {
  readonly codingPath: readonly PathSegment[];
  /** Values written directly so far (nested containers land at finalization). */
  readonly count: number;

  encodeNil(): void;
  encodeBool(value: boolean): void;
  encodeInt(value: number | bigint): void;
  encodeUInt(value: number | bigint): void;
  encodeFloat(value: number): void;
  encodeDouble(value: number): void;
  encodeString(value: string): void;
  encodeBinary(value: Uint8Array): void;
  encode(value: unknown): void;

  nestedSequenceContainer(): SequenceContainer;
  nestedMappingContainer<NK extends CodingKey = string>(): MappingContainer<NK>;
  /** Encoder for the parent-type payload; its value lands at the next reserved index. */
  superEncoder(): Encoder;

  /** Flush nested containers and the super link into this container. Runs once. */
  finalize(): void;
}

/**
 * A key → value mapping under construction.
 */
export interface MappingContainer<K extends CodingKey = string> {
  readonly codingPath: readonly PathSegment[];

  encodeNil(key: K): void;
  encodeBool(key: K, value: boolean): void;
  encodeInt(key: K, value: number | bigint): void;
  encodeUInt(key: K, value: number | bigint): void;
  encodeFloat(key: K, value: number): void;
  encodeDouble(key: K, value: number): void;
  encodeString(key: K, value: string): void;
  encodeBinary(key: K, value: Uint8Array): void;
  encode(key: K, value: unknown): void;
  /** Like `encode`, but leaves the key out when `value` is `undefined`. */
  encodeIfPresent(key: K, value: unknown): void;
  contains(key: K): boolean;

  nestedSequenceContainer(key: K): SequenceContainer;
  nestedMappingContainer<NK extends CodingKey = string>(key: K): MappingContainer<NK>;
  /** Encoder for the parent-type payload, stored under `"super"` or under `key`. */
  superEncoder(key?: K): Encoder;

  finalize(): void;
}
