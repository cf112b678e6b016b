// ============================================================================
// @structpack/core — Scalar Conversion
// ============================================================================

import type { PathSegment } from './coding_path.js';
import { EncodingError } from './errors.js';
import type { MessagePackValue } from './value.js';
import { integer, uint } from './value.js';

/**
 * Integer value for a signed write. Non-integers, unsafe numbers and values
 * outside [-2^63, 2^64-1] are rejected with the path they were written at.
 */
export function integerValue(value: number | bigint, path: readonly PathSegment[]): MessagePackValue {
  try {
    return integer(value);
  } catch (err) {
    throw new EncodingError('invalidValue', rangeMessage(err), { path, value, cause: err });
  }
}

/** Integer value for an unsigned write. Negative values are rejected. */
export function unsignedValue(value: number | bigint, path: readonly PathSegment[]): MessagePackValue {
  try {
    return uint(value);
  } catch (err) {
    throw new EncodingError('invalidValue', rangeMessage(err), { path, value, cause: err });
  }
}

function rangeMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
