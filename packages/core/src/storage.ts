// ============================================================================
// @structpack/core — Storage Cells
// ============================================================================
//
// Reference-semantics containers for values under construction. Every
// container front-end wrapping a cell holds the same object, which is how a
// parent observes what its nested children wrote.
// ============================================================================

import type { CodingKey } from './protocol.js';
import type { MessagePackEntry, MessagePackValue } from './value.js';
import { int, keyIdentity, string } from './value.js';

/**
 * Wire form of a coding key: integer keys become `int` values, string keys
 * become `string` values.
 */
export function wireKey(key: CodingKey): MessagePackValue {
  return typeof key === 'number' ? int(key) : string(key);
}

/**
 * A growable ordered list of values.
 */
export class SequenceCell {
  private items: MessagePackValue[] = [];

  /** The number of values in the cell. */
  get length(): number {
    return this.items.length;
  }

  append(value: MessagePackValue): void {
    this.items.push(value);
  }

  /** Insert at `index`, shifting later values. An index past the end appends. */
  insert(value: MessagePackValue, index: number): void {
    this.items.splice(index, 0, value);
  }

  /** A copy of the current contents. */
  copy(): MessagePackValue[] {
    return [...this.items];
  }
}

/**
 * A key → value store indexed by the wire representation of the key.
 * Entries keep the position of their first insertion.
 */
export class MappingCell {
  private readonly index = new Map<string, number>();
  private entries: MessagePackEntry[] = [];

  /** The number of keys in the cell. */
  get size(): number {
    return this.entries.length;
  }

  /** Set the value for `key`, replacing any previous value. */
  set(key: CodingKey, value: MessagePackValue): void {
    const wire = wireKey(key);
    const id = keyIdentity(wire);
    const at = this.index.get(id);
    if (at === undefined) {
      this.index.set(id, this.entries.length);
      this.entries.push([wire, value]);
    } else {
      this.entries[at] = [wire, value];
    }
  }

  get(key: CodingKey): MessagePackValue | undefined {
    const at = this.index.get(keyIdentity(wireKey(key)));
    return at === undefined ? undefined : this.entries[at][1];
  }

  has(key: CodingKey): boolean {
    return this.index.has(keyIdentity(wireKey(key)));
  }

  /** A copy of the current entries. */
  copy(): MessagePackEntry[] {
    return [...this.entries];
  }
}
