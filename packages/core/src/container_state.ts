// ============================================================================
// @structpack/core — Container State
// ============================================================================

import type { MappingCell, SequenceCell } from './storage.js';
import type { MessagePackValue } from './value.js';
import { array, map } from './value.js';

/**
 * What one encoder node currently holds. Moves from `unset` to exactly one
 * of the other states and never changes again.
 */
export type ContainerState =
  | { readonly kind: 'unset' }
  | { readonly kind: 'single'; readonly value: MessagePackValue }
  | { readonly kind: 'sequence'; readonly cell: SequenceCell }
  | { readonly kind: 'mapping'; readonly cell: MappingCell };

export const UNSET: ContainerState = Object.freeze({ kind: 'unset' });

/**
 * Convert a populated state to its Canonical Value. `unset` has none.
 */
export function containerValue(state: ContainerState): MessagePackValue | undefined {
  switch (state.kind) {
    case 'unset':
      return undefined;
    case 'single':
      return state.value;
    case 'sequence':
      return array(state.cell.copy());
    case 'mapping':
      return map(state.cell.copy());
  }
}
